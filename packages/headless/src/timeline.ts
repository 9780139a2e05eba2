import pngjs from 'pngjs';
import { CollaboratorError, type DeviceRegistry, type PriorityLabel, type TickOutcome } from '@irqsim/core';

const { PNG } = pngjs;

export type RGB = readonly [number, number, number];

export const PRIORITY_COLORS: Record<PriorityLabel, RGB> = {
  High: [220, 50, 47],
  Medium: [230, 160, 30],
  Low: [38, 110, 210],
};
export const MAIN_COLOR: RGB = [60, 170, 90];
export const BACKGROUND: RGB = [24, 24, 24];

export type TimelineImage = { width: number; height: number; data: Uint8Array };

// Which row is lit at each tick: a device index, the main row (-1), or nothing.
export function busyRows(outcomes: readonly TickOutcome[], registry: DeviceRegistry): number[] {
  const index = new Map(registry.list().map((d, i) => [d.name, i] as const));
  return outcomes.map(o => {
    const t = o.transition;
    if (t.kind === 'main-process') return -1;
    return index.get(t.device) ?? -2;
  });
}

// One column per tick, one row per device and a final main-process row. RGBA8888.
export function renderTimeline(outcomes: readonly TickOutcome[], registry: DeviceRegistry, cell = 8): TimelineImage {
  if (!Number.isInteger(cell) || cell < 1) throw new RangeError(`cell size must be a positive integer, got ${cell}`);
  const devices = registry.list();
  const rows = devices.length + 1;
  const width = Math.max(1, outcomes.length) * cell;
  const height = rows * cell;
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = BACKGROUND[0]; data[i + 1] = BACKGROUND[1]; data[i + 2] = BACKGROUND[2]; data[i + 3] = 255;
  }
  const fill = (col: number, row: number, c: RGB) => {
    for (let y = row * cell; y < (row + 1) * cell; y++) {
      for (let x = col * cell; x < (col + 1) * cell; x++) {
        const o = (y * width + x) * 4;
        data[o] = c[0]; data[o + 1] = c[1]; data[o + 2] = c[2]; data[o + 3] = 255;
      }
    }
  };
  busyRows(outcomes, registry).forEach((row, col) => {
    if (row === -1) fill(col, rows - 1, MAIN_COLOR);
    else {
      const d = devices[row];
      if (d) fill(col, row, PRIORITY_COLORS[d.priority.label]);
    }
  });
  return { width, height, data };
}

export function encodePng(img: TimelineImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  png.data = Buffer.from(img.data);
  return PNG.sync.write(png);
}

export async function writeTimeline(filePath: string, img: TimelineImage): Promise<void> {
  const [fs, pathMod] = await Promise.all([import('node:fs'), import('node:path')]);
  try {
    await fs.promises.mkdir(pathMod.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, encodePng(img));
  } catch (e) {
    throw new CollaboratorError('ReportWriteFailed', `could not write ${filePath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}
