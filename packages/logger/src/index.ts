import pino from "pino";

export {
	createNodeLogger,
	isLogLevel,
	resolveLogLevel,
	withRunContext,
} from "./node.js";
export * from "./types.js";

export type { Logger } from "pino";
export { pino };
