import * as path from 'node:path';

import * as fs from 'fs-extra';
import { differenceInMilliseconds, isValid, parseISO, subMinutes } from 'date-fns';

import { ARTIFACTS } from '../../constants';
import type { ChartConfig, ProbeConfig, ProbeReading, TempProbesDocument } from '../../shared-schemas/device-documents';
import { silentLogger } from '../logging/logger';
import type { Log } from '../logging/types';
import { contentSignature, type DeviceState } from '../state/device-state';
import { writeTextAtomic } from '../state/safe-json-io';

import type { ArtifactGenerator } from './artifact-generator';
import { renderLineChart, type ChartPoint, type ChartSeries } from './svg-line-chart';

const SEGMENT_GAP_MS = ARTIFACTS.SEGMENT_GAP_HOURS * 60 * 60 * 1000;

export interface TempProbeChartOptions {
  logger?: Log;
  now?: () => Date;
}

type ChartOwner = Pick<DeviceState, 'name' | 'fileName'>;

/**
 * File-name-safe form of a device name, suffixed with a short hash of its store file so
 * names that sanitize alike ("a b", "a_b") never share charts.
 */
export function chartBaseName(device: ChartOwner): string {
  const safe = device.name.replace(/[^A-Za-z0-9._-]/g, '_');
  return `${safe}_${contentSignature(device.fileName).slice(0, 8)}`;
}

export function chartFileName(device: ChartOwner, index: number): string {
  return `Chart_${chartBaseName(device)}-${index}.svg`;
}

function chartFilePattern(device: ChartOwner): RegExp {
  const base = chartBaseName(device).replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^Chart_${base}-\\d+\\.svg$`);
}

export function chartHeight(chartCount: number): number {
  if (chartCount === 2) return ARTIFACTS.CHART_HEIGHT.DOUBLE;
  if (chartCount >= 3) return ARTIFACTS.CHART_HEIGHT.MANY;
  return ARTIFACTS.CHART_HEIGHT.SINGLE;
}

/** Split readings into segments wherever consecutive points are more than 24 hours apart. */
export function splitSegments(points: ChartPoint[]): ChartPoint[][] {
  const segments: ChartPoint[][] = [];
  let current: ChartPoint[] = [];
  for (const point of points) {
    const previous = current.at(-1);
    if (previous && differenceInMilliseconds(point.time, previous.time) > SEGMENT_GAP_MS) {
      segments.push(current);
      current = [];
    }
    current.push(point);
  }
  if (current.length > 0) segments.push(current);
  return segments;
}

interface PreparedChart {
  series: ChartSeries[];
  yMin: number;
  yMax: number;
}

/**
 * Group readings by probe, keeping those inside the look-back window and, when the chart
 * names probes, only those probes. Returns null when nothing is left to draw.
 */
export function prepareChart(
  history: readonly ProbeReading[],
  chart: ChartConfig,
  probes: readonly ProbeConfig[],
  now: Date
): PreparedChart | null {
  const wanted = chart.Probes ?? [];
  const days = chart.DaysToShow ?? ARTIFACTS.DEFAULT_DAYS_TO_SHOW;
  const earliest = subMinutes(now, Math.round(days * 24 * 60));

  const byProbe = new Map<string, ChartPoint[]>();
  const values: number[] = [];
  for (const reading of history) {
    const probeName = reading.ProbeName;
    const temperature = reading.Temperature;
    if (!probeName || typeof temperature !== 'number' || !reading.Timestamp) continue;
    if (wanted.length > 0 && !wanted.includes(probeName)) continue;
    const time = parseISO(reading.Timestamp);
    if (!isValid(time) || time < earliest) continue;

    const points = byProbe.get(probeName) ?? [];
    points.push({ time, value: temperature });
    byProbe.set(probeName, points);
    values.push(temperature);
  }
  if (values.length === 0) return null;

  const names = [...byProbe.keys()].sort();
  const series = names.map((name, i): ChartSeries => {
    const config = probes.find((p) => p.Name === name);
    const points = (byProbe.get(name) ?? []).sort((a, b) => a.time.getTime() - b.time.getTime());
    return {
      label: config?.DisplayName ?? name,
      colour: config?.Colour ?? ARTIFACTS.PALETTE[i % ARTIFACTS.PALETTE.length],
      segments: splitSegments(points),
    };
  });

  return {
    series,
    yMin: Math.min(...values) - ARTIFACTS.Y_PADDING,
    yMax: Math.max(...values) + ARTIFACTS.Y_PADDING,
  };
}

/**
 * Renders the temperature charts configured under `Charting.Charts` of a TempProbes device.
 * Charts left over from a previous run are removed first, so disabling charting clears them.
 */
export class TempProbeChartGenerator implements ArtifactGenerator {
  readonly name = 'temp-probe-charts';
  private readonly logger: Log;
  private readonly now: () => Date;

  constructor(private readonly outputDir: string, options: TempProbeChartOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  appliesTo(device: DeviceState): boolean {
    return device.payload.kind === 'TempProbes';
  }

  async outputsExist(files: readonly string[]): Promise<boolean> {
    for (const file of files) {
      if (!(await fs.pathExists(path.join(this.outputDir, file)))) return false;
    }
    return true;
  }

  async generate(device: DeviceState): Promise<string[]> {
    if (device.payload.kind !== 'TempProbes') return [];
    const document: TempProbesDocument = device.payload.document;

    await fs.ensureDir(this.outputDir);
    await this.removeExisting(device);

    const history = document.TempProbeLogging?.history ?? [];
    const charting = document.Charting;
    if (history.length === 0 || !charting || charting.Enable !== true) return [];

    const charts = charting.Charts ?? [];
    const probes = document.TempProbeLogging?.probes ?? [];
    const height = chartHeight(charts.length);
    const now = this.now();
    this.logger.log(`Generating temp probe charts for '${device.name}'`, 'debug');

    const written: string[] = [];
    for (const [index, chart] of charts.entries()) {
      const fileName = chartFileName(device, index);
      try {
        const prepared = prepareChart(history, chart, probes, now);
        if (!prepared) {
          this.logger.log(`No temperature readings to chart for ${fileName}`, 'warning');
          continue;
        }
        const svg = renderLineChart({
          width: ARTIFACTS.CHART_WIDTH,
          height,
          title: chart.Name ?? `Chart ${device.name}-${index}`,
          yLabel: 'Temperature C',
          yMin: prepared.yMin,
          yMax: prepared.yMax,
          series: prepared.series,
          legend: prepared.series.length > 1,
        });
        await writeTextAtomic(path.join(this.outputDir, fileName), svg, { logger: this.logger });
        written.push(fileName);
      } catch (error) {
        this.logger.log(`Error generating temperature chart ${fileName}: ${String(error)}`, 'error');
      }
    }
    return written;
  }

  private async removeExisting(device: ChartOwner): Promise<void> {
    const pattern = chartFilePattern(device);
    const entries = await fs.readdir(this.outputDir);
    for (const entry of entries) {
      if (!pattern.test(entry)) continue;
      try {
        await fs.remove(path.join(this.outputDir, entry));
      } catch (error) {
        this.logger.log(`Error deleting existing temp probe chart ${entry}: ${String(error)}`, 'warning');
      }
    }
  }
}
