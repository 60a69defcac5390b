import { Engine } from "./engine";
import { exportHtml } from "./exporter";
import { parseMetadata, splitHeader, type Metadata } from "./metadata";

export type CompileResult = { html: string; metadata: Metadata };

export function renderAgm(body: string): string {
  return exportHtml(new Engine(body).run());
}

export function compileAgm(text: string): CompileResult {
  const { header, body } = splitHeader(text);
  const metadata = parseMetadata(header);
  return { html: renderAgm(body), metadata };
}

export { Engine, scan, slugify } from "./engine";
export { exportHtml } from "./exporter";
export { Region } from "./region";
export {
  ParseError,
  MONTH_NAMES,
  compareDates,
  formatDate,
  parseDate,
  parseMetadata,
  splitHeader,
  type DocumentDate,
  type HeaderLine,
  type Metadata,
} from "./metadata";
export {
  TAG_DEFINITIONS,
  canPrune,
  getTag,
  renderHtml,
  shouldExport,
  type ExportPolicy,
  type HookKind,
  type RenderMode,
  type TagAttrs,
  type TagDefinition,
  type TagName,
} from "./tags";
