export * from "./logger";
export * from "./errors";
export * from "./bus";
export * from "./startup_options";
export * from "./identity";
export * from "./exit_coordinator";
export * from "./activation_channel";
export * from "./activation_token";
export * from "./service_adaptor";
export * from "./activation_receiver";
export * from "./registration_coordinator";
export * from "./activation_forwarder";
export * from "./bus_service";
export * from "./inter_process_lock";
export * from "./in_memory_bus";
export * from "./dbus_next_connection";
