import { getTag, renderHtml, type TagAttrs, type TagDefinition, type TagName } from "./tags";

export class Region {
  readonly def: TagDefinition;
  readonly attrs: TagAttrs;
  private parts: string[] = [];
  private sealed = false;

  constructor(def: TagDefinition | TagName) {
    this.def = typeof def === "string" ? getTag(def) : def;
    this.attrs = { ...this.def.defaultAttrs };
  }

  get tagName(): TagName {
    return this.def.name;
  }

  get inner(): string {
    if (this.parts.length > 1) this.parts = [this.parts.join("")];
    return this.parts[0] ?? "";
  }

  get isEmpty(): boolean {
    return this.parts.every((p) => p === "");
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  append(text: string): void {
    this.checkMutable();
    if (text !== "") this.parts.push(text);
  }

  prepend(text: string): void {
    this.checkMutable();
    if (text !== "") this.parts.unshift(text);
  }

  setAttr(name: string, value: string | undefined): void {
    this.checkMutable();
    this.attrs[name] = value;
  }

  render(): string {
    this.sealed = true;
    return renderHtml(this.def, this.inner, this.attrs);
  }

  private checkMutable(): void {
    if (this.sealed) throw new Error(`region ${this.tagName} is already rendered`);
  }
}
