import type { DetectionMethod, Region } from '@sheet-tables/shared';
import type { DetectionStrategy } from './detection-strategy';

/** Placeholder slot for style-based detection; the grid carries no formatting yet */
export class FormattingStrategy implements DetectionStrategy {
  readonly method: DetectionMethod = 'formatting';

  detect(): Region[] {
    return [];
  }
}
