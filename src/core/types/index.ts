// CHANGE: Central export file for configuration types
// WHY: Single import point for types shared by CORE, SHELL and APP

export type { CLIOptions, SessionSettings, TableConfig } from "./config.js";
