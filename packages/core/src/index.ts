export * as Store from "./store";
export * as Context from "./context_manager";
export * as Skills from "./skill_registry";
export * as Engine from "./task_engine";
export * as EventBus from "./event_bus";
export * as Credentials from "./credentials";
export * as Logger from "./logger";
export * as Types from "./types";
export * as GitHub from "./github";
export * as Utils from "./utils";

// Config: the manager plus the stores it reads from
export * as Config from "./config";

// Skills shipped with the package
export * as BuiltinSkills from "./builtin_skills";
