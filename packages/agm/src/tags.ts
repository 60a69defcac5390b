export type ExportPolicy = "always" | "never" | "auto" | "pruneIfEmpty";
export type RenderMode = "both" | "beginOnly" | "endOnly" | "selfClosing";
export type HookKind =
  | "none"
  | "headingBegin"
  | "headingEnd"
  | "blockBegin"
  | "blockEnd"
  | "urlEnd"
  | "listItemBegin";

export type TagName =
  | "codeBlock"
  | "code"
  | "heading3"
  | "heading2"
  | "heading1"
  | "embedPixel"
  | "embedSmall"
  | "embed"
  | "url"
  | "link"
  | "bold"
  | "italic"
  | "listItem"
  | "text"
  | "paragraphBegin"
  | "paragraphEnd"
  | "sectionBegin"
  | "sectionEnd"
  | "caption"
  | "rule"
  | "list"
  | "anchor";

export type TagAttrs = Record<string, string | undefined>;

export type TagDefinition = {
  readonly name: TagName;
  readonly begin?: string;
  readonly end?: string;
  readonly isRegion: boolean;
  readonly isExclusive: boolean;
  readonly preservesWhitespace: boolean;
  readonly exportPolicy: ExportPolicy;
  readonly renderMode: RenderMode;
  readonly htmlTag?: string;
  readonly defaultAttrs: Readonly<TagAttrs>;
  readonly requires?: readonly TagName[];
  readonly onBegin: HookKind;
  readonly onEnd: HookKind;
};

type TagOptions = Partial<Omit<TagDefinition, "name">>;

function defineTag(name: TagName, options: TagOptions): TagDefinition {
  const def: TagDefinition = {
    name,
    isRegion: false,
    isExclusive: false,
    preservesWhitespace: false,
    exportPolicy: "always",
    renderMode: "both",
    onBegin: "none",
    onEnd: "none",
    ...options,
    defaultAttrs: Object.freeze({ ...(options.defaultAttrs ?? {}) }),
  };
  return Object.freeze(def);
}

export const IMAGE_TAGS: readonly TagName[] = ["embedPixel", "embedSmall", "embed"];
export const URL_TARGET_TAGS: readonly TagName[] = ["link", ...IMAGE_TAGS];

// Matching is first-hit in this order; a delimiter that prefixes another goes after it.
export const TAG_DEFINITIONS: readonly TagDefinition[] = Object.freeze([
  defineTag("codeBlock", {
    begin: "```",
    end: "```",
    isRegion: true,
    isExclusive: true,
    preservesWhitespace: true,
    exportPolicy: "auto",
    htmlTag: "pre",
    defaultAttrs: { class: "code" },
    onBegin: "blockBegin",
    onEnd: "blockEnd",
  }),
  defineTag("code", { begin: "`", end: "`", isExclusive: true, htmlTag: "code" }),
  defineTag("heading3", {
    begin: "###",
    isRegion: true,
    htmlTag: "h3",
    onBegin: "headingBegin",
    onEnd: "headingEnd",
  }),
  defineTag("heading2", {
    begin: "##",
    isRegion: true,
    htmlTag: "h2",
    onBegin: "headingBegin",
    onEnd: "headingEnd",
  }),
  defineTag("heading1", {
    begin: "#",
    isRegion: true,
    htmlTag: "h1",
    onBegin: "headingBegin",
    onEnd: "headingEnd",
  }),
  defineTag("embedPixel", {
    begin: "!pixel[",
    end: "]",
    isRegion: true,
    renderMode: "selfClosing",
    htmlTag: "img",
    defaultAttrs: { class: "embed-pixel", src: undefined, alt: undefined },
    onBegin: "blockBegin",
    onEnd: "blockEnd",
  }),
  defineTag("embedSmall", {
    begin: "!small[",
    end: "]",
    isRegion: true,
    renderMode: "selfClosing",
    htmlTag: "img",
    defaultAttrs: { class: "embed-small", src: undefined, alt: undefined },
  }),
  defineTag("embed", {
    begin: "![",
    end: "]",
    isRegion: true,
    renderMode: "selfClosing",
    htmlTag: "img",
    defaultAttrs: { class: "embed", src: undefined, alt: undefined },
    onBegin: "blockBegin",
    onEnd: "blockEnd",
  }),
  defineTag("url", {
    begin: "](",
    end: ")",
    isRegion: true,
    isExclusive: true,
    exportPolicy: "never",
    requires: URL_TARGET_TAGS,
    onEnd: "urlEnd",
  }),
  defineTag("link", {
    begin: "[",
    end: "]",
    isRegion: true,
    htmlTag: "a",
    defaultAttrs: { class: "link", href: undefined },
  }),
  defineTag("bold", { begin: "*", end: "*", htmlTag: "strong" }),
  defineTag("italic", { begin: "/", end: "/", htmlTag: "em" }),
  defineTag("listItem", { begin: "-", htmlTag: "li", onBegin: "listItemBegin" }),
  defineTag("text", { isRegion: true, exportPolicy: "auto" }),
  defineTag("paragraphBegin", {
    isRegion: true,
    exportPolicy: "pruneIfEmpty",
    renderMode: "beginOnly",
    htmlTag: "p",
  }),
  defineTag("paragraphEnd", {
    isRegion: true,
    exportPolicy: "pruneIfEmpty",
    renderMode: "endOnly",
    htmlTag: "p",
  }),
  defineTag("sectionBegin", { isRegion: true, renderMode: "beginOnly", htmlTag: "section" }),
  defineTag("sectionEnd", { isRegion: true, renderMode: "endOnly", htmlTag: "section" }),
  defineTag("caption", {
    isRegion: true,
    exportPolicy: "auto",
    htmlTag: "span",
    defaultAttrs: { class: "caption" },
  }),
  defineTag("rule", { isRegion: true, renderMode: "selfClosing", htmlTag: "hr" }),
  defineTag("list", { htmlTag: "ul" }),
  defineTag("anchor", { htmlTag: "a", defaultAttrs: { href: undefined, id: undefined } }),
]);

const TAG_INDEX: ReadonlyMap<TagName, TagDefinition> = new Map(
  TAG_DEFINITIONS.map((def) => [def.name, def]),
);

export function getTag(name: TagName): TagDefinition {
  const def = TAG_INDEX.get(name);
  if (!def) throw new Error(`unknown tag: ${name}`);
  return def;
}

export function isSingleLine(def: TagDefinition): boolean {
  return def.begin !== undefined && def.end === undefined;
}

export function shouldExport(def: TagDefinition, innerIsEmpty: boolean): boolean {
  if (def.exportPolicy === "never") return false;
  if (def.exportPolicy === "auto") return !innerIsEmpty;
  return true;
}

export function canPrune(def: TagDefinition, innerIsEmpty: boolean): boolean {
  return (def.exportPolicy === "auto" || def.exportPolicy === "pruneIfEmpty") && innerIsEmpty;
}

export function escapeText(text: string): string {
  return text.replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttr(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

function attrsToString(attrs: Readonly<TagAttrs>): string {
  let out = "";
  for (const key of Object.keys(attrs).sort()) {
    const value = attrs[key];
    if (value === undefined) continue;
    out += ` ${key}="${escapeAttr(value)}"`;
  }
  return out;
}

export function renderHtml(
  def: TagDefinition,
  inner: string,
  attrs: Readonly<TagAttrs>,
  mode: RenderMode = def.renderMode,
): string {
  const tag = def.htmlTag;
  if (!tag) return mode === "selfClosing" ? "" : inner;
  if (mode === "selfClosing") return `<${tag}${attrsToString(attrs)} />`;
  let out = "";
  if (mode === "both" || mode === "beginOnly") out += `<${tag}${attrsToString(attrs)}>`;
  out += inner;
  if (mode === "both" || mode === "endOnly") out += `</${tag}>`;
  return out;
}
