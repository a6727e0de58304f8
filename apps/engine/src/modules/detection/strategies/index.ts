export type { DetectionStrategy, RowSegment } from './detection-strategy';
export { boundsRegion, segmentsFromBoundaries } from './detection-strategy';
export { FrozenPanesStrategy } from './frozen-panes.strategy';
export { FinancialStatementStrategy, containsFinancialTerm } from './financial-statement.strategy';
export { BlankRowSeparationStrategy } from './blank-row-separation.strategy';
export { TemporalHeadersStrategy } from './temporal-headers.strategy';
export { ColumnContinuityStrategy } from './column-continuity.strategy';
export { MultirowHeadersStrategy } from './multirow-headers.strategy';
export { GapsStrategy } from './gaps.strategy';
export { FormattingStrategy } from './formatting.strategy';
export { ContentStructureStrategy } from './content-structure.strategy';
