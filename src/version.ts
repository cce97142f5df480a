export const TOOL_NAME = "modweave";
export const TOOL_VERSION = "0.1.0";
