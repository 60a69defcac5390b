import fs from "fs";
import os from "os";
import path from "path";
import pino from "pino";
import { SiteBuilder, type SiteBuilderConfig } from "./builder";

const logger = pino({ level: "silent" });

function write(file: string, text: string) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text, "utf8");
}

describe("SiteBuilder", () => {
  let root: string;
  let config: SiteBuilderConfig;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "agmBuilderTest-"));
    config = {
      sourceDir: path.join(root, "content"),
      outputDir: path.join(root, "public"),
      templateDir: path.join(root, "templates"),
      defaultTemplate: "page",
      siteTitle: "Notes",
    };
    write(path.join(config.templateDir, "page.html"), "<title>{{title}} - {{siteTitle}}</title>{{body}}");
    write(path.join(config.templateDir, "post.html"), "<h1>{{title}}</h1><p>{{date}}</p>{{body}}");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  test("compiles documents and copies other files", async () => {
    write(path.join(config.sourceDir, "index.agm"), "title Home\n---\nWelcome *all*");
    write(
      path.join(config.sourceDir, "posts", "first.agm"),
      "title First\ndate 2024-01-02\ntemplate post\n---\nhello",
    );
    write(path.join(config.sourceDir, "img", "cat.png"), "not really a png");
    write(path.join(config.sourceDir, ".hidden"), "skip me");

    const report = await new SiteBuilder(config, logger).build();

    expect(report.failures).toStrictEqual([]);
    expect(report.copiedCount).toBe(1);
    expect(report.pages.map((p) => [p.source, p.output, p.template])).toStrictEqual([
      ["posts/first.agm", "posts/first.html", "post"],
      ["index.agm", "index.html", "page"],
    ]);
    expect(fs.readFileSync(path.join(config.outputDir, "index.html"), "utf8")).toBe(
      "<title>Home - Notes</title><section><p>Welcome <strong>all</strong></p></section>",
    );
    expect(fs.readFileSync(path.join(config.outputDir, "posts", "first.html"), "utf8")).toBe(
      "<h1>First</h1><p>January 2, 2024</p><section><p>hello</p></section>",
    );
    expect(fs.readFileSync(path.join(config.outputDir, "img", "cat.png"), "utf8")).toBe(
      "not really a png",
    );
    expect(fs.existsSync(path.join(config.outputDir, ".hidden"))).toBe(false);
  });

  test("sorts pages newest first with undated pages last", async () => {
    write(path.join(config.sourceDir, "b.agm"), "title B\n---\nb");
    write(path.join(config.sourceDir, "a.agm"), "title A\n---\na");
    write(path.join(config.sourceDir, "old.agm"), "date 2020-05-01\n---\nx");
    write(path.join(config.sourceDir, "new.agm"), "date 2024-12-31\n---\nx");
    write(path.join(config.sourceDir, "mid.agm"), "date 2024-2-9\n---\nx");

    const report = await new SiteBuilder(config, logger).build();

    expect(report.pages.map((p) => p.source)).toStrictEqual([
      "new.agm",
      "mid.agm",
      "old.agm",
      "a.agm",
      "b.agm",
    ]);
  });

  test("records failures and keeps building", async () => {
    write(path.join(config.sourceDir, "bad.agm"), "title Bad\ndate 2023-02-29\n---\nx");
    write(path.join(config.sourceDir, "lost.agm"), "template missing\n---\nx");
    write(path.join(config.sourceDir, "good.agm"), "title Good\n---\nx");

    const report = await new SiteBuilder(config, logger).build();

    expect(report.pages.map((p) => p.source)).toStrictEqual(["good.agm"]);
    expect(report.failures.map((f) => f.source)).toStrictEqual(["bad.agm", "lost.agm"]);
    expect(report.failures[0].error).toBe('day out of range at line 2: "date 2023-02-29"');
    expect(report.failures[1].error).toMatch(/^template not found: .*missing\.html/);
    expect(fs.existsSync(path.join(config.outputDir, "bad.html"))).toBe(false);
  });

  test("compiles a single file", async () => {
    write(path.join(config.sourceDir, "one.agm"), "title One\nauthor Ann\n---\n# Top");
    const page = await new SiteBuilder(config, logger).compileFile("one.agm");
    expect(page.title).toBe("One");
    expect(page.metadata.author).toBe("Ann");
    expect(page.date).toBeUndefined();
    expect(fs.readFileSync(path.join(config.outputDir, "one.html"), "utf8")).toBe(
      '<title>One - Notes</title><section><h1><a href="#top" id="top">Top</a></h1></section>' +
        "<section></section>",
    );
  });
});
