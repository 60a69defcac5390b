import type { Region } from "./region";
import { canPrune, shouldExport } from "./tags";

function pairsWith(a: Region, b: Region | undefined): boolean {
  return (
    b !== undefined &&
    a.def.htmlTag !== undefined &&
    a.def.htmlTag === b.def.htmlTag &&
    a.def.renderMode === "beginOnly" &&
    b.def.renderMode === "endOnly"
  );
}

function isPrunable(visible: readonly Region[], index: number): boolean {
  const region = visible[index];
  if (!region || !canPrune(region.def, region.isEmpty)) return false;
  const prev = visible[index - 1];
  const next = visible[index + 1];
  if (region.def.renderMode === "beginOnly") {
    return next !== undefined && canPrune(next.def, next.isEmpty) && pairsWith(region, next);
  }
  if (region.def.renderMode === "endOnly") {
    return prev !== undefined && canPrune(prev.def, prev.isEmpty) && pairsWith(prev, region);
  }
  return false;
}

export function exportHtml(regions: readonly Region[]): string {
  const visible = regions.filter((r) => shouldExport(r.def, r.isEmpty));
  const openCounts = new Map<string, number>();
  let out = "";
  for (let i = 0; i < visible.length; i++) {
    const region = visible[i];
    if (isPrunable(visible, i)) continue;
    const tag = region.def.htmlTag;
    if (tag !== undefined && region.def.renderMode === "endOnly") {
      const count = openCounts.get(tag) ?? 0;
      if (count <= 0) continue;
      openCounts.set(tag, count - 1);
    } else if (tag !== undefined && region.def.renderMode === "beginOnly") {
      openCounts.set(tag, (openCounts.get(tag) ?? 0) + 1);
    }
    out += region.render();
  }
  return out;
}
