import { Region } from "./region";
import { getTag } from "./tags";

describe("Region", () => {
  it("copies the default attributes", () => {
    const region = new Region("link");
    expect(region.attrs).toStrictEqual({ class: "link", href: undefined });
    region.setAttr("href", "http://example.com");
    expect(getTag("link").defaultAttrs.href).toBeUndefined();
    expect(new Region("link").attrs.href).toBeUndefined();
  });

  it("accumulates inner content", () => {
    const region = new Region("text");
    expect(region.isEmpty).toBe(true);
    region.append("b");
    region.append("");
    region.prepend("a");
    region.append("c");
    expect(region.inner).toBe("abc");
    expect(region.isEmpty).toBe(false);
  });

  it("is sealed once rendered", () => {
    const region = new Region("caption");
    region.append("hello");
    expect(region.render()).toBe('<span class="caption">hello</span>');
    expect(region.isSealed).toBe(true);
    expect(() => region.append("x")).toThrow(/already rendered/);
    expect(() => region.setAttr("class", "x")).toThrow(/already rendered/);
  });
});
