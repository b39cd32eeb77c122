/**
 * Named pattern presets
 */

import { InvalidArgumentError } from "../errors.js";
import type { InciseSpec } from "../pattern/incise.js";
import type { InterpolationSpec } from "../pattern/interpolation.js";
import type { TaleaCount, TaleaSpec } from "../pattern/talea.js";

import presetsJson from "../../presets/patterns.json" with { type: "json" };

interface TaleaPresetJson {
  id: string;
  description: string;
  counts: readonly (number | string)[];
  denominator: number;
  preamble: readonly number[];
  endCounts: readonly number[];
}

interface IncisePresetJson extends Required<Omit<InciseSpec, "prefixTalea" | "suffixTalea">> {
  id: string;
  description: string;
  prefixTalea: readonly number[];
  suffixTalea: readonly number[];
}

interface InterpolationPresetJson {
  id: string;
  description: string;
  startDuration: readonly number[];
  stopDuration: readonly number[];
  writtenDuration: readonly number[];
}

interface PresetLibraryJson {
  taleae: readonly TaleaPresetJson[];
  incisions: readonly IncisePresetJson[];
  interpolations: readonly InterpolationPresetJson[];
}

const library: PresetLibraryJson = presetsJson;

function taleaCount(value: number | string, presetId: string): TaleaCount {
  if (typeof value === "number" || value === "+" || value === "-") {
    return value;
  }
  throw new InvalidArgumentError(`talea preset ${presetId} has unknown count ${value}`);
}

function durationPair(values: readonly number[], label: string): [number, number] {
  if (values.length !== 2) {
    throw new InvalidArgumentError(`${label} must be a [numerator, denominator] pair`);
  }
  return [values[0], values[1]];
}

// ========================================
// Preset Libraries
// ========================================

export const taleaPresets = new Map<string, TaleaSpec>(
  library.taleae.map((preset) => [
    preset.id,
    {
      counts: preset.counts.map((count) => taleaCount(count, preset.id)),
      denominator: preset.denominator,
      preamble: [...preset.preamble],
      endCounts: [...preset.endCounts]
    }
  ])
);

export const incisePresets = new Map<string, InciseSpec>(
  library.incisions.map(({ id, description, ...spec }) => [id, spec])
);

export const interpolationPresets = new Map<string, InterpolationSpec>(
  library.interpolations.map((preset) => [
    preset.id,
    {
      startDuration: durationPair(preset.startDuration, `${preset.id} start duration`),
      stopDuration: durationPair(preset.stopDuration, `${preset.id} stop duration`),
      writtenDuration: durationPair(preset.writtenDuration, `${preset.id} written duration`)
    }
  ])
);

function lookup<T>(presets: Map<string, T>, id: string, family: string): T {
  const preset = presets.get(id);
  if (!preset) {
    throw new InvalidArgumentError(`${family} preset not found: ${id}`);
  }
  return preset;
}

export function taleaPreset(id: string): TaleaSpec {
  return lookup(taleaPresets, id, "talea");
}

export function incisePreset(id: string): InciseSpec {
  return lookup(incisePresets, id, "incise");
}

export function interpolationPreset(id: string): InterpolationSpec {
  return lookup(interpolationPresets, id, "interpolation");
}
