import fs from "fs/promises";
import path from "path";
import type { Metadata } from "agm-markup";

export type TemplateVars = Record<string, string>;

const PLACEHOLDER_RE = /\{\{\s*([A-Za-z][A-Za-z0-9_-]*)\s*\}\}/g;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Builds the placeholder values of one page.
 * The body is already HTML; every other value is escaped.
 * Free header fields are exposed under their own key; the known keys win over them.
 */
export function pageVariables(metadata: Metadata, body: string, siteTitle = ""): TemplateVars {
  const vars: TemplateVars = {};
  for (const [key, value] of Object.entries(metadata.fields)) {
    vars[key] = escapeHtml(value ?? "");
  }
  vars.title = escapeHtml(metadata.title ?? "");
  vars.siteTitle = escapeHtml(siteTitle);
  vars.template = escapeHtml(metadata.template ?? "");
  if (metadata.static) {
    vars.author = "";
    vars.date = "";
    vars.static = "static";
  } else {
    vars.author = escapeHtml(metadata.author ?? "");
    vars.date = escapeHtml(metadata.date?.text ?? "");
    vars.static = "";
  }
  vars.body = body;
  return vars;
}

export class TemplateService {
  private cache = new Map<string, string>();

  constructor(private readonly dir: string) {}

  async load(name: string): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;
    if (!/^[A-Za-z0-9_-]+$/.test(name)) {
      throw new Error(`invalid template name: ${name}`);
    }
    const file = path.join(this.dir, `${name}.html`);
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (e) {
      throw new Error(`template not found: ${file}: ${e}`);
    }
    this.cache.set(name, text);
    return text;
  }

  render(template: string, vars: Readonly<TemplateVars>): string {
    return template.replace(PLACEHOLDER_RE, (_, name: string) => vars[name] ?? "");
  }

  async renderPage(name: string, vars: Readonly<TemplateVars>): Promise<string> {
    return this.render(await this.load(name), vars);
  }

  clearCache(): void {
    this.cache.clear();
  }
}
