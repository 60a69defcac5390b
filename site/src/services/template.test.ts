import fs from "fs";
import os from "os";
import path from "path";
import { compileAgm } from "agm-markup";
import { escapeHtml, pageVariables, TemplateService } from "./template";

describe("TemplateService", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "agmTemplateTest-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("replaces placeholders and blanks unknown ones", () => {
    const service = new TemplateService(dir);
    const out = service.render("<h1>{{title}}</h1>{{ body }}{{missing}}", {
      title: "T",
      body: "<p>b</p>",
    });
    expect(out).toBe("<h1>T</h1><p>b</p>");
  });

  test("loads templates by name and caches them", async () => {
    fs.writeFileSync(path.join(dir, "page.html"), "<main>{{body}}</main>", "utf8");
    const service = new TemplateService(dir);
    expect(await service.renderPage("page", { body: "x" })).toBe("<main>x</main>");
    fs.writeFileSync(path.join(dir, "page.html"), "changed", "utf8");
    expect(await service.load("page")).toBe("<main>{{body}}</main>");
    service.clearCache();
    expect(await service.load("page")).toBe("changed");
  });

  test("names a missing template file", async () => {
    const service = new TemplateService(dir);
    await expect(service.load("nope")).rejects.toThrow(/template not found: .*nope\.html/);
    await expect(service.load("../etc")).rejects.toThrow("invalid template name: ../etc");
  });
});

describe("pageVariables", () => {
  test("escapes metadata but keeps the body", () => {
    const { html, metadata } = compileAgm(
      "title Tom & <Jerry>\nauthor Ann\ndate 2024-03-05\nmood \"happy\"\n---\n*hi*",
    );
    const vars = pageVariables(metadata, html, "Site");
    expect(vars.title).toBe("Tom &amp; &lt;Jerry&gt;");
    expect(vars.author).toBe("Ann");
    expect(vars.date).toBe("March 5, 2024");
    expect(vars.mood).toBe("&quot;happy&quot;");
    expect(vars.siteTitle).toBe("Site");
    expect(vars.static).toBe("");
    expect(vars.body).toBe("<section><p><strong>hi</strong></p></section>");
  });

  test("static pages carry no author or date", () => {
    const { metadata } = compileAgm("title About\nauthor Ann\ndate 2024-03-05\nstatic\n---\nx");
    const vars = pageVariables(metadata, "");
    expect(vars.author).toBe("");
    expect(vars.date).toBe("");
    expect(vars.static).toBe("static");
  });

  test("escapeHtml", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });
});
