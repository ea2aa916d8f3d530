/**
 * Configuration entry point: ConfigManager with its ConfigStore backends.
 */
export * from "./config_manager";
export * from "./config_store";
