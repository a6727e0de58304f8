import type { FrozenPanes } from './grid-types';

/** Resolved options handed to every detection strategy */
export interface DetectionOptions {
  tableDetection: {
    useGaps: boolean;
    gapThreshold: number;
  };
  /** Frozen pane hint; zero counts mean "no hint" */
  frozen: FrozenPanes;
}
