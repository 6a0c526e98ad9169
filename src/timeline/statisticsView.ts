import type { GameRecord, StatisticsSummary } from '../types/index.js';
import { buildChartModel, countGamesByYear } from './stats.js';
import type { ChartAdapter, ChartModel } from './types.js';

/**
 * Keeps one chart in step with the displayed list. The first drawing comes from the
 * precomputed summary; later ones are recounted from whatever list is shown.
 */
export class StatisticsView {
  private readonly adapter: ChartAdapter;
  private rendered = false;

  constructor(adapter: ChartAdapter) {
    this.adapter = adapter;
  }

  render(summary: StatisticsSummary): ChartModel {
    const model = buildChartModel(summary.gamesByYear);
    this.adapter.render(model);
    this.rendered = true;
    return model;
  }

  update(games: readonly GameRecord[]): ChartModel {
    const model = buildChartModel(countGamesByYear(games));
    if (this.rendered) {
      this.adapter.update(model);
    } else {
      this.adapter.render(model);
      this.rendered = true;
    }
    return model;
  }

  destroy(): void {
    this.adapter.destroy?.();
    this.rendered = false;
  }
}
