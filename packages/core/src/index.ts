/**
 * @boxflow/core
 *
 * Box-model and normal-flow layout: block formatting, margin collapsing,
 * floats over an immutable exclusion space, and a collect → break → construct
 * inline pipeline with bounded retry.
 */

// =============================================================================
// Engine
// =============================================================================

export {
  createLayoutEngine,
  type LayoutEngine,
  type LayoutNodeOptions,
  type LayoutOptions,
  type LayoutOutput,
} from "./engine.js";

export {
  DEFAULT_LAYOUT_CONFIG,
  defaultStyleLookup,
  resolveLayoutConfig,
  type LayoutConfig,
  type ResolvedLayoutConfig,
  type StyleLookup,
} from "./config.js";

export { BoxflowError, type BoxflowErrorCode } from "./errors.js";
export {
  consoleWarn,
  createLayoutDiagnostics,
  warnLayoutIssue,
  type LayoutDiagnostics,
  type WarnFn,
} from "./diagnostics.js";

// =============================================================================
// Document and style
// =============================================================================

export { h, type Child, type ElementOptions } from "./document/h.js";
export {
  describeNode,
  isElement,
  isText,
  type DocNode,
  type ElementNode,
  type TextNode,
} from "./document/types.js";
export {
  defaultDisplay,
  isLineBreakTag,
  isReplacedTag,
  withTagDefaults,
} from "./document/userAgent.js";
export {
  computeStyle,
  isPercentage,
  readLengthPercentage,
  readLengthPercentageAuto,
  type StyleIssueReporter,
} from "./style/computeStyle.js";
export { INITIAL_STYLE, initialStyleWithFontSize } from "./style/initial.js";
export type {
  Clear,
  ComputedStyle,
  Display,
  EdgeShorthand,
  FloatSide,
  FontWeight,
  LengthPercentage,
  LengthPercentageAuto,
  MaxSize,
  Overflow,
  PositionScheme,
  StyleDeclaration,
  TextAlign,
  VerticalAlign,
  WhiteSpace,
} from "./style/types.js";

// =============================================================================
// Output boxes and geometry
// =============================================================================

export {
  NO_BOXES,
  borderBoxHeight,
  borderBoxRect,
  borderBoxWidth,
  buildParentIndex,
  contentRect,
  marginBoxRect,
  paddingBoxRect,
  translateBox,
  walkBoxes,
  type Box,
  type BoxFragment,
  type BoxKind,
  type FragmentEdges,
  type ImagePayload,
  type LineBox,
} from "./layout/box.js";
export {
  ZERO_EDGES,
  clampMinMax,
  clampNonNegative,
  edges,
  horizontal,
  rectBottom,
  rectRight,
  unionRect,
  vertical,
  type BoxEdges,
  type IntrinsicSizes,
  type Position,
  type Rect,
  type Size,
} from "./layout/geometry.js";

// =============================================================================
// Float queries and constraint spaces
// =============================================================================

export {
  ExclusionSpace,
  bandsOverlap,
  type Exclusion,
  type ExclusionSide,
  type FloatDropLimits,
  type FloatDropResult,
  type InlineOffsets,
} from "./layout/exclusionSpace.js";
export { ConstraintSpace, type ConstraintSpaceInit } from "./layout/constraintSpace.js";
export {
  FloatManager,
  type FloatContainer,
  type FloatInfo,
  type PlacedFloatSide,
} from "./layout/floatManager.js";

// =============================================================================
// Box model, margins, intrinsic sizes
// =============================================================================

export {
  clampHeight,
  clampWidth,
  establishesFormattingContext,
  isShrinkToFit,
  relativeOffset,
  resolveDisplay,
  resolveEdges,
  resolveLength,
  resolveLengthAuto,
  type ResolvedEdges,
} from "./layout/boxModel.js";
export { collapseMarginList, collapseMargins, shouldCollapseMargins } from "./layout/margins.js";
export {
  collapsesThrough,
  effectiveTopMargins,
  hasInlineContent,
} from "./layout/marginChain.js";
export {
  intrinsicContentSizes,
  intrinsicSizes,
  type IntrinsicEnv,
} from "./layout/intrinsic.js";

// =============================================================================
// Inline pipeline
// =============================================================================

export {
  collectInlineItems,
  type CollectEnv,
  type CollectOptions,
} from "./layout/inline/collect.js";
export { breakLines, type BreakLinesOptions } from "./layout/inline/breakLines.js";
export {
  constructFragments,
  type ConstructOptions,
  type ConstructResult,
} from "./layout/inline/construct.js";
export {
  runInlinePipeline,
  sameLineSpace,
  type InlineLayoutResult,
  type InlinePipelineInput,
} from "./layout/inline/pipeline.js";
export type {
  AtomicItem,
  BlockChildItem,
  CloseTagItem,
  ControlItem,
  FloatItem,
  Fragment,
  InlineItem,
  InlineItemKind,
  LineGeometry,
  LineInfo,
  OpenTagItem,
  OutOfFlowItem,
  TextItem,
} from "./layout/inline/items.js";

// =============================================================================
// Collaborators
// =============================================================================

export {
  createFixedAdvanceMeasurer,
  fixedAdvanceMeasurer,
  type FixedAdvanceOptions,
  type FontSpec,
  type TextMeasurer,
} from "./layout/textMeasure.js";
export {
  noImageSizes,
  resolveNaturalImageSize,
  type ImageSizeProvider,
  type NaturalImageSize,
} from "./layout/images.js";
