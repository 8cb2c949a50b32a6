export { BODY_TITLE, type BuiltContent, SectionCollector } from "./builder.js";
export { classifySection } from "./classify.js";
export { scoreConfidence } from "./confidence.js";
export {
  DocumentParser,
  type DocumentParserOptions,
  type ParseResult,
  defaultStrategies,
} from "./document-parser.js";
export { HtmlStrategy, type HtmlStrategyOptions } from "./html.js";
export { type ExtractedMetadata, cleanDoi, parseYear } from "./metadata.js";
export { PdfStrategy } from "./pdf.js";
export { type TextLine, bodyFontSize, isHeadingLine, layoutLines } from "./pdf-layout.js";
export type { Extraction, ParseInput, ParseStrategy } from "./strategy.js";
export { collapseWhitespace, splitParagraphs } from "./text.js";
export { XmlStrategy } from "./xml.js";
