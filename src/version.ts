/**
 * Version of the G3D format this library reads and writes
 */
export const G3D_VERSION = Object.freeze({
  major: 0,
  minor: 9,
  patch: 0,
  date: "2018-12-20",
});

export function formatVersion(): string {
  return `${G3D_VERSION.major}.${G3D_VERSION.minor}.${G3D_VERSION.patch}`;
}
