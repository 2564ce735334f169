// CHANGE: Public surface of shell configuration
// WHY: Single import point for CLI parsing and config loading

export { parseCLIArgs } from "./cli.js";
export {
	CONFIG_FILE_NAME,
	defaultConfigPath,
	loadTableConfig,
	validateTableConfig,
} from "./loader.js";
