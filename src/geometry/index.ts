/**
 * chatport - Geometry Domain
 */

export {
  ZERO_RECT,
  rectWithSize,
  unionRect,
  translateRect,
  intersects,
  containsPoint,
  cloneRect,
} from "./rect";
