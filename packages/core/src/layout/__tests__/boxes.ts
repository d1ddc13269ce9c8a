import type { Box } from "../box.js";

/** Descendant of `box` by child indices; throws when the path runs out. */
export function childAt(box: Box | undefined, ...path: number[]): Box {
  let at = box;
  for (const i of path) at = at?.children[i];
  if (!at) throw new Error(`no box at [${path.join(", ")}]`);
  return at;
}
