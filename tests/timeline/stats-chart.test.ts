import test from 'node:test';
import assert from 'node:assert/strict';

import { StatisticsView } from '../../src/timeline/statisticsView.js';
import { buildChartModel, countGamesByYear, listSummaryYears } from '../../src/timeline/stats.js';
import { layoutBarChart } from '../../src/timeline/ui/chart.js';
import { RecordingChart, makeGame } from '../__utils__/test-helpers.js';

test('buildChartModel sorts years ascending', () => {
  const model = buildChartModel({ '2021': 40, '2019': 12, '2020': 30 });
  assert.deepEqual(model.labels, ['2019', '2020', '2021']);
  assert.deepEqual(model.values, [12, 30, 40]);
});

test('buildChartModel drops non-year keys', () => {
  const model = buildChartModel({ unknown: 3, '2020': 1 });
  assert.deepEqual(model.labels, ['2020']);
});

test('listSummaryYears lists newest first', () => {
  assert.deepEqual(listSummaryYears({ gamesByYear: { '2019': 1, '2021': 2, '2020': 3 } }), ['2021', '2020', '2019']);
});

test('countGamesByYear ignores undated games', () => {
  const counts = countGamesByYear([
    makeGame({ firstFreeDate: '2020-03-01T12:00:00' }),
    makeGame({ firstFreeDate: '2020-09-01T12:00:00' }),
    makeGame({ firstFreeDate: '2018-09-01T12:00:00' }),
    makeGame({ firstFreeDate: null })
  ]);
  assert.deepEqual(counts, { '2020': 2, '2018': 1 });
});

test('StatisticsView renders the summary, then updates from the list', () => {
  const chart = new RecordingChart();
  const view = new StatisticsView(chart);

  view.render({ gamesByYear: { '2020': 5, '2019': 2 } });
  view.update([makeGame({ firstFreeDate: '2019-05-05T12:00:00' })]);

  assert.deepEqual(
    chart.calls.map(call => call.type),
    ['render', 'update']
  );
  assert.deepEqual(chart.calls[0].model, { labels: ['2019', '2020'], values: [2, 5] });
  assert.deepEqual(chart.calls[1].model, { labels: ['2019'], values: [1] });

  view.destroy();
  assert.equal(chart.destroyed, true);
});

test('StatisticsView update before render draws instead', () => {
  const chart = new RecordingChart();
  new StatisticsView(chart).update([]);
  assert.deepEqual(chart.calls, [{ type: 'render', model: { labels: [], values: [] } }]);
});

test('layoutBarChart scales bars against a rounded maximum', () => {
  const layout = layoutBarChart({ labels: ['2019', '2020'], values: [10, 30] }, 480, 280);

  assert.equal(layout.maxValue, 40);
  assert.deepEqual(layout.gridLevels, [0, 10, 20, 30, 40]);
  assert.equal(layout.bars.length, 2);
  assert.deepEqual(
    layout.bars.map(bar => [bar.label, Math.round(bar.x), Math.round(bar.width), Math.round(bar.y), Math.round(bar.height)]),
    [
      ['2019', 70, 140, 199, 53],
      ['2020', 270, 140, 93, 159]
    ]
  );
});

test('layoutBarChart of an empty model has no bars', () => {
  const layout = layoutBarChart({ labels: [], values: [] }, 300, 200);
  assert.equal(layout.bars.length, 0);
  assert.equal(layout.maxValue, 20);
});
