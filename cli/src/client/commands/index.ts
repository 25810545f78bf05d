// Commands Module Index
// Re-exports all command registration functions

export { registerFailedCommands } from "./failed";
export { registerFilesCommand } from "./files";
export { registerRunCommand } from "./run";
export { registerServerCommands } from "./server";
export { registerSessionCommands } from "./session";
