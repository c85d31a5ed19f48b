export { type CacheOptions, cache, resolveEntries } from "./cache";
export { clean } from "./clean";
export {
	type ConfigInitOptions,
	configInit,
	configShow,
} from "./config/index";
export { type InfoOptions, info } from "./info";
export { type RunOptions, run } from "./run";
export { type VendorOptions, vendor } from "./vendor";
