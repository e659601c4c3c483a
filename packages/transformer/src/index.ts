/**
 * @enumkit/transformer - macro expansion for enumkit
 */

export { enumTransformerFactory, type EnumTransformerConfig, type TransformerExtras } from "./transformer.js";
export { enumTransformerFactory as default } from "./transformer.js";
export {
  transformCode,
  type TransformCodeOptions,
  type TransformDiagnostic,
  type TransformResult,
} from "./transform-code.js";
export { HELP, nodeIO, runCli, type CliIO } from "./commands.js";
