import type { DiaryDocument, Section } from "../types/index.js";

export function formatHeading(section: Pick<Section, "level" | "title">): string {
  return `${"#".repeat(section.level)} ${section.title}`;
}

function writeSection(section: Section, out: string[]): void {
  if (!section.implicit) {
    out.push(section.heading ?? formatHeading(section));
  }
  out.push(...section.body);
  for (const child of section.children) {
    writeSection(child, out);
  }
}

export function serializeDiary(document: DiaryDocument): string {
  const out = [...document.preamble];
  for (const chapter of document.chapters) {
    writeSection(chapter, out);
  }
  return out.join("\n");
}
