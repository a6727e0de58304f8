import type { FrozenPanes } from '../types/grid-types';
import type { DetectionOptions } from '../types/options-types';
import type { TableOptionsInput } from '../schemas/options-schema';
import { toFrozenPanes } from './grid-utils';

export interface DetectionDefaults {
  useGaps: boolean;
  gapThreshold: number;
}

export const NO_FROZEN_PANES: FrozenPanes = { frozenRows: 0, frozenCols: 0 };

/**
 * Merge per-call options over defaults. A frozen hint passed through
 * `sheet_data` takes precedence over the sheet's own frozen panes.
 */
export function resolveDetectionOptions(
  input: TableOptionsInput | undefined,
  defaults: DetectionDefaults,
  sheetFrozen?: FrozenPanes,
): DetectionOptions {
  const detection = input?.table_detection;
  const hint = input?.sheet_data
    ? toFrozenPanes(input.sheet_data.frozen_panes, input.sheet_data.frozen)
    : undefined;

  return {
    tableDetection: {
      useGaps: detection?.use_gaps ?? defaults.useGaps,
      gapThreshold: detection?.gap_threshold ?? defaults.gapThreshold,
    },
    frozen: hint ?? sheetFrozen ?? NO_FROZEN_PANES,
  };
}

export function hasFrozenPanes(frozen: FrozenPanes): boolean {
  return frozen.frozenRows > 0 || frozen.frozenCols > 0;
}
