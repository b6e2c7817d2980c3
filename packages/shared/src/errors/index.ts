export { ErrorCode } from "./codes.js";
export { type ErrorSeverity, inferSeverity } from "./severity.js";
