import { Injectable, Logger } from '@nestjs/common';
import type { DetectionMethod, DetectionOptions, Grid, Region } from '@sheet-tables/shared';
import { assertGrid, isGridEmpty } from '@sheet-tables/shared';
import { RegionValidatorService } from './region-validator.service';
import {
  boundsRegion,
  BlankRowSeparationStrategy,
  ColumnContinuityStrategy,
  ContentStructureStrategy,
  FinancialStatementStrategy,
  FormattingStrategy,
  FrozenPanesStrategy,
  GapsStrategy,
  MultirowHeadersStrategy,
  TemporalHeadersStrategy,
  type DetectionStrategy,
} from './strategies';

/**
 * Finds table regions by running the strategy chain in priority order.
 * The first strategy that yields regions wins; later ones never run.
 */
@Injectable()
export class RegionDetectorService {
  private readonly logger = new Logger(RegionDetectorService.name);

  private readonly strategies: readonly DetectionStrategy[] = [
    new FrozenPanesStrategy(),
    new FinancialStatementStrategy(),
    new BlankRowSeparationStrategy(),
    new TemporalHeadersStrategy(),
    new ColumnContinuityStrategy(),
    new MultirowHeadersStrategy(),
    new GapsStrategy(),
    new FormattingStrategy(),
    new ContentStructureStrategy(),
  ];

  constructor(private readonly validator: RegionValidatorService) {}

  get strategyOrder(): DetectionMethod[] {
    return [...this.strategies.map((s) => s.method), 'default'];
  }

  detect(grid: Grid | null | undefined, options: DetectionOptions): Region[] {
    assertGrid(grid);
    const { bounds } = grid;

    for (const strategy of this.strategies) {
      const candidates = strategy.detect(grid, bounds, options);
      if (candidates.length === 0) continue;

      const regions = this.validator.validate(candidates, bounds);
      this.logger.debug(`${strategy.method}: ${regions.length} region(s)`);
      return regions;
    }

    if (isGridEmpty(grid)) return [];
    this.logger.debug('default: whole sheet as one region');
    return [boundsRegion(bounds, 'default')];
  }
}
