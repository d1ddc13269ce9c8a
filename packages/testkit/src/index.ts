export { assert, describe, test } from "./nodeTest.js";
export { geometriesOf, geometryOf, type GeometryLike } from "./geometry.js";
