import { format } from 'date-fns';

export interface ChartPoint {
  time: Date;
  value: number;
}

export interface ChartSeries {
  label: string;
  colour: string;
  /** Each segment is drawn as its own line; gaps between segments stay empty */
  segments: ChartPoint[][];
}

export interface LineChartOptions {
  width: number;
  height: number;
  title?: string;
  yLabel?: string;
  yMin: number;
  yMax: number;
  series: ChartSeries[];
  legend: boolean;
}

const MARGIN = { top: 20, right: 20, bottom: 60, left: 70 } as const;
const X_TICKS = 6;
const HOUR_MS = 60 * 60 * 1000;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fixed(n: number): string {
  return n.toFixed(1);
}

/** Step of 1, 2 or 5 times a power of ten, close to `raw` */
export function niceStep(raw: number): number {
  if (!(raw > 0) || !Number.isFinite(raw)) return 1;
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const residual = raw / magnitude;
  if (residual <= 1) return magnitude;
  if (residual <= 2) return 2 * magnitude;
  if (residual <= 5) return 5 * magnitude;
  return 10 * magnitude;
}

export function yTicks(min: number, max: number, target = 5): number[] {
  const step = niceStep((max - min) / target);
  const ticks: number[] = [];
  for (let v = Math.ceil(min / step) * step; v <= max + step * 1e-9; v += step) {
    ticks.push(Number(v.toFixed(6)));
  }
  return ticks;
}

function timeRange(series: ChartSeries[]): { start: number; end: number } {
  let start = Number.POSITIVE_INFINITY;
  let end = Number.NEGATIVE_INFINITY;
  for (const s of series) {
    for (const segment of s.segments) {
      for (const p of segment) {
        start = Math.min(start, p.time.getTime());
        end = Math.max(end, p.time.getTime());
      }
    }
  }
  if (!Number.isFinite(start)) {
    const now = Date.now();
    return { start: now - HOUR_MS, end: now + HOUR_MS };
  }
  if (start === end) return { start: start - HOUR_MS, end: end + HOUR_MS };
  return { start, end };
}

/** Render a time series line chart as a standalone SVG document. */
export function renderLineChart(options: LineChartOptions): string {
  const { width, height, yMin, yMax } = options;
  const plotW = width - MARGIN.left - MARGIN.right;
  const plotH = height - MARGIN.top - MARGIN.bottom;
  const { start, end } = timeRange(options.series);
  const ySpan = yMax > yMin ? yMax - yMin : 1;

  const x = (t: Date) => MARGIN.left + ((t.getTime() - start) / (end - start)) * plotW;
  const y = (v: number) => MARGIN.top + (1 - (v - yMin) / ySpan) * plotH;

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`
  );

  // Grid and axes
  for (const tick of yTicks(yMin, yMax)) {
    const ty = fixed(y(tick));
    parts.push(
      `<line x1="${MARGIN.left}" y1="${ty}" x2="${MARGIN.left + plotW}" y2="${ty}" stroke="#000000" stroke-opacity="0.1"/>`,
      `<text x="${MARGIN.left - 8}" y="${ty}" font-size="12" text-anchor="end" dominant-baseline="middle">${tick}</text>`
    );
  }
  for (let i = 0; i < X_TICKS; i++) {
    const t = new Date(start + ((end - start) * i) / (X_TICKS - 1));
    const tx = fixed(x(t));
    const ty = MARGIN.top + plotH;
    parts.push(
      `<line x1="${tx}" y1="${MARGIN.top}" x2="${tx}" y2="${ty}" stroke="#000000" stroke-opacity="0.1"/>`,
      `<text x="${tx}" y="${ty + 16}" font-size="12" text-anchor="end" transform="rotate(-30 ${tx} ${ty + 16})">${escapeXml(format(t, 'dd-MMM h a'))}</text>`
    );
  }
  parts.push(
    `<rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotW}" height="${plotH}" fill="none" stroke="#000000"/>`
  );
  if (options.yLabel) {
    const cy = MARGIN.top + plotH / 2;
    parts.push(
      `<text x="16" y="${fixed(cy)}" font-size="12" text-anchor="middle" transform="rotate(-90 16 ${fixed(cy)})">${escapeXml(options.yLabel)}</text>`
    );
  }

  // Series
  for (const s of options.series) {
    const colour = escapeXml(s.colour);
    for (const segment of s.segments) {
      if (segment.length > 1) {
        const points = segment.map((p) => `${fixed(x(p.time))},${fixed(y(p.value))}`).join(' ');
        parts.push(`<polyline points="${points}" fill="none" stroke="${colour}" stroke-width="2"/>`);
      }
      for (const p of segment) {
        parts.push(`<circle cx="${fixed(x(p.time))}" cy="${fixed(y(p.value))}" r="3" fill="${colour}"/>`);
      }
    }
  }

  if (options.legend) {
    const lx = MARGIN.left + plotW - 160;
    options.series.forEach((s, i) => {
      const ly = MARGIN.top + 18 + i * 18;
      parts.push(
        `<line x1="${lx}" y1="${ly}" x2="${lx + 20}" y2="${ly}" stroke="${escapeXml(s.colour)}" stroke-width="2"/>`,
        `<text x="${lx + 26}" y="${ly}" font-size="12" dominant-baseline="middle">${escapeXml(s.label)}</text>`
      );
    });
  }

  if (options.title) {
    parts.push(
      `<text x="${MARGIN.left + 8}" y="${MARGIN.top + 20}" font-size="14" font-weight="bold">${escapeXml(options.title)}</text>`
    );
  }

  parts.push('</svg>');
  return parts.join('\n') + '\n';
}
