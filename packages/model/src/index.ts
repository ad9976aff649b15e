export type { Word, WordInput } from './word';
export type { Page, PageInput } from './page';
export {
  LayoutType,
  LAYOUT_TYPE_NAMES,
  type ColumnBoundary,
  type DetectionMethod,
  type GutterMetrics,
  type Layout,
  type LayoutMetrics,
  type LayoutTypeName,
} from './layout';
export type {
  Column,
  DocumentLayoutResult,
  GlobalColumnStructure,
  PageLayoutResult,
} from './column';
