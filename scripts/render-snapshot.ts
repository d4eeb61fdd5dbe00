/* eslint-disable no-console */
/**
 * Runs the automaton headless and writes the final grid as a PPM image.
 *
 * Usage: npx tsx scripts/render-snapshot.ts [--steps 100] [--width 320] [--height 180]
 *          [--settings settings.json] [--out snapshot.ppm]
 *
 * The settings file holds the same document the app persists: per-channel
 * filters and activations under "red", "green" and "blue".
 */

import { readFileSync, writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { GRID_WIDTH, GRID_HEIGHT } from "../src/constants";
import { NcaEngine } from "../src/simulation/nca-engine";
import { defaultSettings, loadSettingsDocument, snapshotFromSettings } from "../src/simulation/parameters";
import { encodePPM } from "../src/utils/image-utils";

function nonNegativeInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function main(): void {
  const { values } = parseArgs({
    options: {
      steps: { type: "string", default: "100" },
      width: { type: "string" },
      height: { type: "string" },
      settings: { type: "string" },
      out: { type: "string", default: "snapshot.ppm" },
    },
  });

  const steps = nonNegativeInt("steps", values.steps, 100);
  const width = nonNegativeInt("width", values.width, GRID_WIDTH);
  const height = nonNegativeInt("height", values.height, GRID_HEIGHT);
  const settings = values.settings === undefined
    ? defaultSettings()
    : loadSettingsDocument(JSON.parse(readFileSync(values.settings, "utf8")));
  const parameters = snapshotFromSettings(settings);

  const engine = new NcaEngine({ width, height, getParameters: () => parameters });
  const t0 = performance.now();
  for (let i = 0; i < steps; i++) {
    engine.step();
  }
  const elapsed = performance.now() - t0;

  const out = values.out ?? "snapshot.ppm";
  writeFileSync(out, encodePPM(engine.current));
  console.log(`${steps} steps on ${width}x${height} in ${elapsed.toFixed(0)}ms -> ${out}`);
}

main();
