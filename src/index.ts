export {
  DEFAULT_INDENT_UNIT,
  TypeLayoutParseError,
  assembleTypes,
  parseTypeSizeOutput,
  parseTypeSizes,
  stripWrapper,
} from "./parser/index.js";
export { matchElement, matchTypeHeader, matchWrapper } from "./parser/classify.js";
export { buildElement } from "./parser/elements.js";
export { buildTree } from "./parser/tree.js";
export { resolveParseOptions } from "./parser/defaults.js";
export { selectTypes } from "./report/select.js";
export { renderHtml, renderTypeList, writeHtmlReport } from "./render/html.js";
export { renderJson, renderText } from "./render/text.js";
export { ConfigError, loadConfigFile, mergeConfig, parseConfigYaml } from "./config.js";
export { buildCargoArgs, runCargo, touchFile } from "./cargo/run.js";
export type * from "./types.js";
