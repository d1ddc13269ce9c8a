/**
 * packages/testkit/src/geometry.ts — Narrow layout records to the fields a test asserts.
 *
 * Layout outputs carry styles, nodes and child lists; comparing whole records
 * with deepEqual makes failures unreadable.
 */

export type GeometryLike = Readonly<{ x: number; y: number; width: number; height: number }>;

/** Border-box origin plus content size, the usual shape of a layout assertion. */
export function geometryOf(value: GeometryLike): GeometryLike {
  return { x: value.x, y: value.y, width: value.width, height: value.height };
}

/** Geometry of every entry, in order. */
export function geometriesOf(values: readonly GeometryLike[]): GeometryLike[] {
  return values.map(geometryOf);
}
