/**
 * chatport - Rendering Domain
 */

export {
  layoutStack,
  columnLimits,
  totalHeight,
  type MeasureFn,
  type LayoutInput,
  type StackLayout,
} from "./layout";
