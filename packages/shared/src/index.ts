// ============================================
// Agent Tools Shared
// ============================================

export { ErrorCode, type ErrorSeverity, inferSeverity } from "./errors/index.js";
export { displayEnvValue, isSensitiveVariable, maskValue } from "./utils/mask.js";
