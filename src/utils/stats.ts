import type { G3d } from "../G3d";

/**
 * Human-readable summary: attribute count, header, one line per
 * attribute and corners per face
 */
export function formatG3dStats(g3d: G3d): string {
  const lines = [
    `Number of attributes = ${g3d.size}`,
    "Header",
    g3d.header ?? "",
  ];
  for (const { key, store } of g3d.entries()) {
    lines.push(
      `${key} #bytes=${store.bytes.byteLength} #items=${store.numElements}`,
    );
  }
  lines.push(`${g3d.cornersPerFace} corners per face`);
  return lines.join("\n");
}
