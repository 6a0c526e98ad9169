import { CONFIG } from '../../config.js';
import { createElement, createSvgElement, setVisible } from '../../utils/dom.js';
import type { ChartAdapter, ChartModel } from '../types.js';

export interface BarLayout {
  label: string;
  value: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ChartLayout {
  width: number;
  height: number;
  bars: BarLayout[];
  gridLevels: number[];
  maxValue: number;
}

const PAD_X = 40;
const PAD_TOP = 40;
const PAD_BOTTOM = 28;

/**
 * Round the axis maximum up to a multiple of the grid step (20, like the tick step).
 * @param maxValue
 */
function niceMax(maxValue: number): number {
  const step = 20;
  return Math.max(step, Math.ceil(maxValue / step) * step);
}

/**
 * Geometry for a bar chart of `model` inside a `width` x `height` box.
 * @param model
 * @param width
 * @param height
 */
export function layoutBarChart(model: ChartModel, width: number, height: number): ChartLayout {
  const maxValue = niceMax(Math.max(0, ...model.values));
  const contentWidth = Math.max(1, width - PAD_X * 2);
  const contentHeight = Math.max(1, height - PAD_TOP - PAD_BOTTOM);
  const slot = model.labels.length > 0 ? contentWidth / model.labels.length : contentWidth;
  const barWidth = slot * 0.7;

  const bars = model.labels.map((label, index) => {
    const value = model.values[index] ?? 0;
    const barHeight = (value / maxValue) * contentHeight;
    return {
      label,
      value,
      x: PAD_X + slot * index + (slot - barWidth) / 2,
      y: height - PAD_BOTTOM - barHeight,
      width: barWidth,
      height: barHeight
    };
  });

  const gridLevels: number[] = [];
  for (let level = 0; level <= maxValue; level += maxValue / 4) {
    gridLevels.push(Math.round(level));
  }

  return { width, height, bars, gridLevels, maxValue };
}

/**
 * Per-year bar chart drawn as inline SVG. Each draw replaces the previous SVG.
 * A `<canvas>` container cannot show SVG children, so the chart then goes into a
 * host element inserted after it and the canvas is hidden.
 */
export class SvgBarChart implements ChartAdapter {
  private readonly container: HTMLElement;
  private svg: SVGSVGElement | null = null;
  private mount: HTMLElement | null = null;
  private ownsMount = false;

  constructor(container: HTMLElement) {
    this.container = container;
  }

  render(model: ChartModel): void {
    this.draw(model);
  }

  update(model: ChartModel): void {
    this.draw(model);
  }

  destroy(): void {
    this.svg?.remove();
    this.svg = null;
    if (this.ownsMount) {
      this.mount?.remove();
      this.ownsMount = false;
    }
    this.mount = null;
  }

  private host(): HTMLElement {
    if (this.mount) {
      return this.mount;
    }
    if (this.container.tagName === 'CANVAS') {
      const host = createElement('div', { className: 'chart-svg-host' });
      this.container.after(host);
      setVisible(this.container, false);
      this.mount = host;
      this.ownsMount = true;
    } else {
      this.mount = this.container;
    }
    return this.mount;
  }

  private draw(model: ChartModel): void {
    const host = this.host();
    const containerWidth = host.getBoundingClientRect().width;
    const width = Math.max(320, Math.round(containerWidth || 800));
    const { height, bars, gridLevels, maxValue } = layoutBarChart(model, width, CONFIG.CHART.HEIGHT);
    const contentHeight = height - PAD_TOP - PAD_BOTTOM;

    const svg = createSvgElement('svg', {
      viewBox: `0 0 ${width} ${height}`,
      width: '100%',
      height: `${height}px`,
      role: 'img',
      'aria-label': CONFIG.CHART.TITLE
    });
    svg.classList.add('games-chart-svg');

    const title = createSvgElement('text', {
      x: width / 2,
      y: 22,
      'text-anchor': 'middle',
      fill: '#ffffff',
      'font-size': 18,
      'font-weight': 'bold'
    });
    title.textContent = CONFIG.CHART.TITLE;
    svg.appendChild(title);

    gridLevels.forEach(level => {
      const y = height - PAD_BOTTOM - (level / maxValue) * contentHeight;
      svg.appendChild(
        createSvgElement('line', {
          x1: PAD_X,
          x2: width - PAD_X,
          y1: y,
          y2: y,
          stroke: 'rgba(255, 255, 255, 0.1)',
          'stroke-width': 1
        })
      );
      const tick = createSvgElement('text', {
        x: PAD_X - 8,
        y: y + 4,
        'text-anchor': 'end',
        fill: '#a0a0a0',
        'font-size': 11
      });
      tick.textContent = String(level);
      svg.appendChild(tick);
    });

    bars.forEach(bar => {
      const rect = createSvgElement('rect', {
        x: bar.x,
        y: bar.y,
        width: bar.width,
        height: bar.height,
        rx: 6,
        fill: CONFIG.CHART.BAR_COLOR,
        stroke: CONFIG.CHART.BAR_BORDER_COLOR,
        'stroke-width': 2,
        'data-year': bar.label
      });
      const tooltip = createSvgElement('title');
      tooltip.textContent = `${bar.value} games`;
      rect.appendChild(tooltip);
      svg.appendChild(rect);

      const label = createSvgElement('text', {
        x: bar.x + bar.width / 2,
        y: height - PAD_BOTTOM + 16,
        'text-anchor': 'middle',
        fill: '#a0a0a0',
        'font-size': 11
      });
      label.textContent = bar.label;
      svg.appendChild(label);
    });

    if (this.svg && this.svg.parentNode === host) {
      host.replaceChild(svg, this.svg);
    } else {
      host.replaceChildren(svg);
    }
    this.svg = svg;
  }
}
