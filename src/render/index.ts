export { renderFactsJson } from "./json.js";
export { renderFactValue, renderFactsText, type TextRenderOptions } from "./text.js";
