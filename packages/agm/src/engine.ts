import { Region } from "./region";
import {
  escapeText,
  getTag,
  IMAGE_TAGS,
  isSingleLine,
  renderHtml,
  shouldExport,
  TAG_DEFINITIONS,
  URL_TARGET_TAGS,
  type HookKind,
  type TagDefinition,
  type TagName,
} from "./tags";

type BeginMatch = { def: TagDefinition; delimiter: string };

export function slugify(text: string): string {
  return text
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "")
    .toLowerCase();
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, "");
}

/**
 * Single-pass scanner turning AGM source into a flat sequence of regions.
 *
 * Text always goes to the last region of the arena. Structural boundaries
 * (paragraphs, sections) are regions of their own, so nesting is expressed only
 * by position in the sequence. A region tag closed while another region tag is
 * open is rendered into that enclosing region.
 */
export class Engine {
  private readonly src: string;
  private pos = 0;
  private readonly arena: Region[] = [];
  private readonly active = new Map<TagName, Region | null>();
  private readonly activeOrder: TagName[] = [];
  private exclusive: TagName | null = null;
  private escaped = false;
  private blankRun = 0;
  private solid = 0;
  private indent = 0;
  private listDepth = -1;
  private pendingSpace = false;
  private atBlockStart = true;
  private skipWhitespace = false;
  private paragraphOpen = false;
  private afterFence = false;
  private bracketDepth = 0;
  private headingAnchorOpen = false;
  private finished = false;
  private readonly anchorIds = new Set<string>();

  constructor(src: string) {
    this.src = src.replace(/\r\n?/g, "\n");
    this.pushRegion("sectionBegin");
    this.openParagraph();
  }

  get regions(): readonly Region[] {
    return this.arena;
  }

  get length(): number {
    return this.arena.length;
  }

  regionAt(index: number): Region {
    const region = this.arena[index];
    if (!region) throw new Error(`region index out of range: ${index}`);
    return region;
  }

  isActive(name: TagName): boolean {
    return this.active.has(name);
  }

  run(): readonly Region[] {
    if (this.finished) return this.arena;
    while (this.pos < this.src.length) this.step();
    this.finish();
    this.finished = true;
    return this.arena;
  }

  private current(): Region {
    return this.regionAt(this.arena.length - 1);
  }

  private pushRegion(name: TagName): Region {
    const region = new Region(name);
    this.arena.push(region);
    return region;
  }

  private insertRegion(name: TagName, beforeEnd: number): Region {
    const region = new Region(name);
    this.arena.splice(Math.max(0, this.arena.length - beforeEnd), 0, region);
    return region;
  }

  private step(): void {
    const c = this.src.charAt(this.pos);
    const atLineStart = this.solid === 0;
    if (this.current().def.preservesWhitespace) {
      if (this.afterFence) {
        this.afterFence = false;
        if (c === "\n") {
          this.pos++;
          return;
        }
      }
    } else {
      if (this.escaped) {
        this.escaped = false;
        this.appendLiteral(c);
        this.pos++;
        return;
      }
      if (c === "\n") {
        this.newline();
        this.pos++;
        return;
      }
      if (c === " " || c === "\t") {
        this.whitespace(c);
        this.pos++;
        return;
      }
      if (atLineStart && this.exclusive === null && this.isRuleLine()) {
        this.rule();
        return;
      }
      this.enterSolid(atLineStart);
      if (c === "\\") {
        this.escaped = true;
        this.pos++;
        return;
      }
      if (this.nestedBracket(c)) return;
    }
    if (this.tryBegin(atLineStart) || this.tryEnd()) return;
    this.appendLiteral(c);
    this.pos++;
  }

  private enterSolid(atLineStart: boolean): void {
    if (
      atLineStart &&
      this.listDepth >= 0 &&
      this.exclusive === null &&
      this.matchBegin(true)?.def.name !== "listItem"
    ) {
      this.closeLists();
    }
    this.solid++;
    this.blankRun = 0;
    this.skipWhitespace = false;
  }

  private newline(): void {
    for (const name of [...this.activeOrder].reverse()) {
      const def = getTag(name);
      if (isSingleLine(def) && this.active.has(name)) this.endTag(def);
    }
    this.blankRun++;
    if (this.blankRun === 1) {
      this.pendingSpace = true;
    } else if (this.blankRun === 2) {
      if (this.listDepth >= 0) this.closeLists();
      else this.openParagraph();
    }
    this.solid = 0;
    this.indent = 0;
    this.skipWhitespace = false;
  }

  private whitespace(c: string): void {
    if (this.solid === 0) this.indent += c === "\t" ? 2 : 1;
    else if (!this.skipWhitespace) this.pendingSpace = true;
  }

  private isRuleLine(): boolean {
    if (!this.src.startsWith("---", this.pos)) return false;
    for (let i = this.pos + 3; i < this.src.length; i++) {
      const c = this.src.charAt(i);
      if (c === "\n") return true;
      if (c !== " " && c !== "\t") return false;
    }
    return true;
  }

  private rule(): void {
    this.closeLists();
    this.endParagraph();
    this.pushRegion("rule");
    this.openParagraph();
    this.pos += 3;
    this.blankRun = 0;
  }

  private matchBegin(atLineStart: boolean): BeginMatch | undefined {
    if (this.exclusive !== null) return undefined;
    for (const def of TAG_DEFINITIONS) {
      const delimiter = def.begin;
      if (delimiter === undefined || this.active.has(def.name)) continue;
      if (isSingleLine(def) && !atLineStart) continue;
      if (def.requires && !def.requires.some((name) => this.active.has(name))) continue;
      if (this.src.startsWith(delimiter, this.pos)) return { def, delimiter };
    }
    return undefined;
  }

  private tryBegin(atLineStart: boolean): boolean {
    const match = this.matchBegin(atLineStart);
    if (!match) return false;
    this.pos += match.delimiter.length;
    this.beginTag(match.def);
    return true;
  }

  // Brackets inside an image caption pair up among themselves and stay literal.
  private nestedBracket(c: string): boolean {
    if (this.exclusive !== null || !IMAGE_TAGS.some((name) => this.active.has(name))) {
      return false;
    }
    if (c === "[") this.bracketDepth++;
    else if (c === "]" && this.bracketDepth > 0) this.bracketDepth--;
    else return false;
    this.appendLiteral(c);
    this.pos++;
    return true;
  }

  private tryEnd(): boolean {
    for (let i = this.activeOrder.length - 1; i >= 0; i--) {
      const def = getTag(this.activeOrder[i]);
      if (def.end === undefined) continue;
      if (this.exclusive !== null && this.exclusive !== def.name) continue;
      if (!this.src.startsWith(def.end, this.pos)) continue;
      this.pos += def.end.length;
      this.endTag(def);
      return true;
    }
    return false;
  }

  private beginTag(def: TagDefinition): void {
    if (isSingleLine(def)) this.skipWhitespace = true;
    if (isSingleLine(def) || this.startsBlock(def)) this.pendingSpace = false;
    this.flushPendingSpace();
    this.activeOrder.push(def.name);
    if (def.isExclusive) this.exclusive = def.name;
    if (def.preservesWhitespace) this.afterFence = true;
    if (def.isRegion) {
      const region = this.pushRegion(def.name);
      this.active.set(def.name, region);
      this.atBlockStart = false;
      this.runHook(def.onBegin, region);
    } else {
      this.active.set(def.name, null);
      this.runHook(def.onBegin, null);
      this.current().append(renderHtml(def, "", def.defaultAttrs, "beginOnly"));
      this.atBlockStart = false;
    }
  }

  private endTag(def: TagDefinition): void {
    const region = this.active.get(def.name) ?? null;
    this.active.delete(def.name);
    const at = this.activeOrder.lastIndexOf(def.name);
    if (at >= 0) this.activeOrder.splice(at, 1);
    if (this.exclusive === def.name) this.exclusive = null;
    if (def.preservesWhitespace) this.afterFence = false;
    if (IMAGE_TAGS.includes(def.name)) this.bracketDepth = 0;
    if (def.isRegion) {
      this.runHook(def.onEnd, region);
      const host = region ? this.hostOf(region) : undefined;
      if (host) this.foldInto(host);
      const current = this.current();
      if (!this.isOpen(current) && current.tagName !== "text") this.pushRegion("text");
    } else {
      this.current().append(renderHtml(def, "", def.defaultAttrs, "endOnly"));
      this.runHook(def.onEnd, null);
    }
  }

  private runHook(kind: HookKind, region: Region | null): void {
    switch (kind) {
      case "none":
        return;
      case "headingBegin":
        return this.headingBegin(this.hookRegion(kind, region));
      case "headingEnd":
        return this.headingEnd(this.hookRegion(kind, region));
      case "blockBegin":
        if (this.isNested(region)) return;
        return this.spliceParagraphEnd();
      case "blockEnd":
        if (this.isNested(region)) return;
        this.endParagraph();
        return this.openParagraph();
      case "urlEnd":
        return this.urlEnd(this.hookRegion(kind, region));
      case "listItemBegin":
        return this.adjustListDepth(Math.floor(this.indent / 2));
    }
  }

  private startsBlock(def: TagDefinition): boolean {
    if (def.onBegin === "headingBegin") return true;
    return def.onBegin === "blockBegin" && !this.isNested(null);
  }

  // Block constructs inside a list or an open region stay inline.
  private isNested(region: Region | null): boolean {
    return this.listDepth >= 0 || this.hostOf(region) !== undefined;
  }

  private isOpen(region: Region): boolean {
    return this.active.get(region.tagName) === region;
  }

  private hostOf(region: Region | null): Region | undefined {
    const limit = region ? this.arena.indexOf(region) : this.arena.length;
    for (let i = this.activeOrder.length - 1; i >= 0; i--) {
      const open = this.active.get(this.activeOrder[i]);
      if (open && open !== region && this.arena.indexOf(open) < limit) return open;
    }
    return undefined;
  }

  private foldInto(host: Region): void {
    const nested = this.arena.splice(this.arena.indexOf(host) + 1);
    if (this.headingAnchorOpen && host.def.onEnd === "headingEnd") {
      if (nested.some((r) => r.tagName === "link")) this.closeHeadingAnchor(host);
    }
    for (const region of nested) {
      if (shouldExport(region.def, region.isEmpty)) host.append(region.render());
    }
  }

  private closeHeadingAnchor(heading: Region): void {
    heading.append(renderHtml(getTag("anchor"), "", {}, "endOnly"));
    this.headingAnchorOpen = false;
  }

  private hookRegion(kind: HookKind, region: Region | null): Region {
    if (!region) throw new Error(`hook ${kind} needs a region`);
    return region;
  }

  private headingBegin(region: Region): void {
    this.spliceParagraphEnd();
    const lineEnd = this.src.indexOf("\n", this.pos);
    const raw = this.src.slice(this.pos, lineEnd < 0 ? this.src.length : lineEnd);
    const id = this.issueAnchorId(slugify(raw) || "heading");
    region.append(renderHtml(getTag("anchor"), "", { href: `#${id}`, id }, "beginOnly"));
    this.headingAnchorOpen = true;
  }

  private headingEnd(region: Region): void {
    if (this.headingAnchorOpen) this.closeHeadingAnchor(region);
    this.endParagraph();
    this.pushRegion("sectionEnd");
    this.pushRegion("sectionBegin");
    this.openParagraph();
  }

  private urlEnd(urlRegion: Region): void {
    const url = urlRegion.inner.trim();
    let index = -1;
    for (let i = this.arena.length - 1; i >= 0; i--) {
      const r = this.regionAt(i);
      if (URL_TARGET_TAGS.includes(r.tagName) && this.active.get(r.tagName) === r) {
        index = i;
        break;
      }
    }
    if (index < 0) return;
    const target = this.regionAt(index);
    if (target.tagName === "link") {
      target.setAttr("href", url);
    } else {
      const alt = stripTags(target.inner).trim();
      target.setAttr("src", url);
      target.setAttr("alt", alt);
      if (target.tagName !== "embedSmall" && alt !== "") {
        this.pushRegion("caption").append(target.inner);
      }
    }
    this.endTag(target.def);
  }

  private issueAnchorId(base: string): string {
    let id = base;
    for (let n = 2; this.anchorIds.has(id); n++) id = `${base}-${n}`;
    this.anchorIds.add(id);
    return id;
  }

  private adjustListDepth(target: number): void {
    if (target === this.listDepth) return;
    if (this.listDepth < 0) {
      this.endParagraph();
      this.pushRegion("text");
    }
    const list = getTag("list");
    let html = "";
    for (; this.listDepth < target; this.listDepth++) {
      html += renderHtml(list, "", list.defaultAttrs, "beginOnly");
    }
    for (; this.listDepth > target; this.listDepth--) {
      html += renderHtml(list, "", list.defaultAttrs, "endOnly");
    }
    this.current().append(html);
    if (target < 0) this.openParagraph();
  }

  private closeLists(): void {
    if (this.listDepth >= 0) this.adjustListDepth(-1);
  }

  private spliceParagraphEnd(): void {
    this.insertRegion("paragraphEnd", 1);
    this.paragraphOpen = false;
  }

  private endParagraph(): void {
    this.pushRegion("paragraphEnd");
    this.paragraphOpen = false;
  }

  private openParagraph(): void {
    if (this.paragraphOpen) this.endParagraph();
    this.pushRegion("paragraphBegin");
    this.paragraphOpen = true;
    this.pushRegion("text");
    this.atBlockStart = true;
    this.pendingSpace = false;
  }

  private flushPendingSpace(): void {
    if (!this.pendingSpace) return;
    this.pendingSpace = false;
    if (!this.atBlockStart) this.current().append(" ");
  }

  private appendLiteral(c: string): void {
    this.flushPendingSpace();
    this.current().append(escapeText(c));
    this.atBlockStart = false;
  }

  private finish(): void {
    for (const name of [...this.activeOrder].reverse()) {
      if (this.active.has(name)) this.endTag(getTag(name));
    }
    this.closeLists();
    this.endParagraph();
    this.pushRegion("sectionEnd");
  }
}

export function scan(src: string): readonly Region[] {
  return new Engine(src).run();
}
