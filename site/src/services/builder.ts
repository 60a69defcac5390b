import fs from "fs/promises";
import path from "path";
import type { Logger } from "pino";
import { compareDates, compileAgm, type DocumentDate, type Metadata } from "agm-markup";
import { pageVariables, TemplateService } from "./template";

export type SiteBuilderConfig = {
  sourceDir: string;
  outputDir: string;
  templateDir: string;
  defaultTemplate: string;
  siteTitle?: string;
};

export type PageInfo = {
  source: string;
  output: string;
  title: string;
  date?: DocumentDate;
  template: string;
  metadata: Metadata;
};

export type BuildFailure = {
  source: string;
  error: string;
};

export type BuildReport = {
  pages: PageInfo[];
  copiedCount: number;
  failures: BuildFailure[];
};

export const DOCUMENT_EXT = ".agm";

export function comparePages(a: PageInfo, b: PageInfo): number {
  const byDate = compareDates(b.date, a.date);
  if (a.date && b.date && byDate !== 0) return byDate;
  if (a.date && !b.date) return -1;
  if (!a.date && b.date) return 1;
  return a.source < b.source ? -1 : a.source > b.source ? 1 : 0;
}

function toPosix(relPath: string): string {
  return relPath.split(path.sep).join("/");
}

export class SiteBuilder {
  private readonly templates: TemplateService;

  constructor(
    private readonly config: SiteBuilderConfig,
    private readonly logger: Logger,
  ) {
    this.templates = new TemplateService(config.templateDir);
  }

  async build(): Promise<BuildReport> {
    const report: BuildReport = { pages: [], copiedCount: 0, failures: [] };
    this.templates.clearCache();
    const files = await this.listFiles(this.config.sourceDir);
    this.logger.info(`building ${files.length} files from ${this.config.sourceDir}`);
    for (const rel of files) {
      try {
        if (rel.endsWith(DOCUMENT_EXT)) {
          const page = await this.compileFile(rel);
          report.pages.push(page);
          this.logger.debug(`compiled ${page.source} -> ${page.output}`);
        } else {
          await this.copyFile(rel);
          report.copiedCount++;
        }
      } catch (e) {
        const error = e instanceof Error ? e.message : String(e);
        this.logger.error(`failed to build ${rel}: ${error}`);
        report.failures.push({ source: rel, error });
      }
    }
    report.pages.sort(comparePages);
    this.logger.info(
      `built ${report.pages.length} pages, copied ${report.copiedCount} files, ` +
        `${report.failures.length} failures`,
    );
    return report;
  }

  async compileFile(relPath: string): Promise<PageInfo> {
    const source = toPosix(relPath);
    const text = await fs.readFile(path.join(this.config.sourceDir, relPath), "utf8");
    const { html, metadata } = compileAgm(text);
    const template = metadata.template ?? this.config.defaultTemplate;
    const vars = pageVariables(metadata, html, this.config.siteTitle);
    const page = await this.templates.renderPage(template, vars);
    const output = source.slice(0, -DOCUMENT_EXT.length) + ".html";
    const outPath = path.join(this.config.outputDir, output);
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.writeFile(outPath, page, "utf8");
    return {
      source,
      output,
      title: metadata.title ?? "",
      date: metadata.date,
      template,
      metadata,
    };
  }

  private async copyFile(relPath: string): Promise<void> {
    const outPath = path.join(this.config.outputDir, relPath);
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.copyFile(path.join(this.config.sourceDir, relPath), outPath);
  }

  private async listFiles(root: string, rel = ""): Promise<string[]> {
    const entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const out: string[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const child = rel === "" ? entry.name : path.join(rel, entry.name);
      if (entry.isDirectory()) {
        out.push(...(await this.listFiles(root, child)));
      } else if (entry.isFile()) {
        out.push(child);
      }
    }
    return out;
  }
}
