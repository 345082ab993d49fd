// CHANGE: Central export point for configuration types
// WHY: Shell and app import types from one place

export type { CLIOptions, OutputConfig } from "./config.js";
