/**
 * Sustainability — material waste, CO₂ and a 1-100 green score per process.
 *
 *   const report = sustainabilityReport(body);
 *   report.greenest         →  'injection_molding'
 *   report.scores[0].grade  →  'A'
 *
 * Each process is costed in its default material: PLA for FDM, resin for
 * SLA, aluminium for CNC, ABS for injection molding. Volumes are cm³,
 * masses grams.
 */

import type { PartMetrics } from './cost.js';
import { PROCESSES, PROCESS_LABELS, type Process } from './rules.js';
import { boxVolume, round, type BoundingBox } from './vec3.js';

// ─── Constants ──────────────────────────────────────────────────

export const SUSTAINABILITY_CONSTANTS = {
  densityGPerCm3: { fdm: 1.24, sla: 1.10, cnc: 2.70, injection_molding: 1.04 },
  kwhPerGram: { fdm: 0.07, sla: 0.10, cnc: 0.22, injection_molding: 0.03 },
  /** Grid average, kg CO₂ per kWh. */
  carbonKgPerKwh: 0.40,
  fdmSupportFactor: 0.10,
  fdmFailRate: 0.08,
  slaSupportFactor: 0.15,
  imRunnerFactor: 0.05,
  /** Stock overhead assumed when the bounding box is smaller than the part. */
  cncFallbackStockFactor: 1.5,
  /** Out of 20. */
  recyclability: { fdm: 15, sla: 5, cnc: 20, injection_molding: 12 },
} as const;

const UNIT_CUBE: BoundingBox = { min: [0, 0, 0], max: [1, 1, 1] };

/** kg CO₂ of everyday activities, smallest first. */
const CARBON_EQUIVALENCIES: readonly (readonly [number, string])[] = [
  [0.008, 'charging a smartphone'],
  [0.036, 'streaming video for 1 hour'],
  [0.077, 'boiling a kettle'],
  [0.41, 'driving 1 mile'],
  [2.3, 'a gallon of gasoline burned'],
];

// ─── Types ──────────────────────────────────────────────────────

export interface WasteEstimate {
  process: Process;
  partVolumeCm3: number;
  rawMaterialCm3: number;
  wasteCm3: number;
  wastePercent: number;
  wasteGrams: number;
  /** Waste grams by source, rounded to 0.01 g. */
  breakdown: Record<string, number>;
}

export interface CarbonEstimate {
  process: Process;
  partMassGrams: number;
  energyKwh: number;
  carbonKg: number;
}

export type GreenGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface GreenScore {
  process: Process;
  /** 1..100, higher is greener. */
  score: number;
  grade: GreenGrade;
  wastePoints: number;
  carbonPoints: number;
  recyclabilityPoints: number;
  explanation: string;
}

export interface SavingsTip {
  from: Process;
  to: Process;
  wasteSavedGrams: number;
  carbonSavedKg: number;
  carbonEquivalency: string;
  message: string;
}

export interface SustainabilityReport {
  waste: WasteEstimate[];
  carbon: CarbonEstimate[];
  /** Best first. */
  scores: GreenScore[];
  greenest: Process;
  recommendation: string;
  savingsTips: SavingsTip[];
}

// ─── Waste ──────────────────────────────────────────────────────

function wasteOf(
  process: Process,
  partVolumeCm3: number,
  rawMaterialCm3: number,
  sources: Record<string, number>,
): WasteEstimate {
  const density = SUSTAINABILITY_CONSTANTS.densityGPerCm3[process];
  const wasteCm3 = rawMaterialCm3 - partVolumeCm3;
  const breakdown: Record<string, number> = {};
  for (const [source, cm3] of Object.entries(sources)) breakdown[source] = round(cm3 * density, 2);
  return {
    process,
    partVolumeCm3,
    rawMaterialCm3,
    wasteCm3,
    wastePercent: rawMaterialCm3 > 0 ? (wasteCm3 / rawMaterialCm3) * 100 : 0,
    wasteGrams: wasteCm3 * density,
    breakdown,
  };
}

export function estimateWaste(process: Process, part: PartMetrics): WasteEstimate {
  const c = SUSTAINABILITY_CONSTANTS;
  const v = part.volumeCm3;
  switch (process) {
    case 'fdm': {
      const supports = v * c.fdmSupportFactor;
      const failedPrints = v * c.fdmFailRate;
      return wasteOf(process, v, v + supports + failedPrints, { supports, failed_prints: failedPrints });
    }
    case 'sla': {
      const supports = v * c.slaSupportFactor;
      return wasteOf(process, v, v + supports, { supports_and_residue: supports });
    }
    case 'cnc': {
      let stock = boxVolume(part.boundingBox ?? UNIT_CUBE);
      if (stock < v) stock = v * c.cncFallbackStockFactor;
      return wasteOf(process, v, stock, { machining_chips: stock - v });
    }
    case 'injection_molding': {
      const runner = v * c.imRunnerFactor;
      return wasteOf(process, v, v + runner, { runner_sprue: runner });
    }
  }
}

// ─── Carbon ─────────────────────────────────────────────────────

export function estimateCarbon(process: Process, part: PartMetrics): CarbonEstimate {
  const c = SUSTAINABILITY_CONSTANTS;
  const partMassGrams = part.volumeCm3 * c.densityGPerCm3[process];
  const energyKwh = partMassGrams * c.kwhPerGram[process];
  return { process, partMassGrams, energyKwh, carbonKg: energyKwh * c.carbonKgPerKwh };
}

// ─── Scoring ────────────────────────────────────────────────────

function grade(score: number): GreenGrade {
  if (score >= 80) return 'A';
  if (score >= 65) return 'B';
  if (score >= 50) return 'C';
  if (score >= 35) return 'D';
  return 'F';
}

function explain(wastePoints: number, carbonPoints: number, recyclabilityPoints: number): string {
  const parts = [
    wastePoints >= 30 ? 'Very low waste' : wastePoints >= 15 ? 'Moderate waste' : 'High material waste',
    carbonPoints >= 30 ? 'Low carbon footprint'
      : carbonPoints >= 15 ? 'Moderate carbon footprint'
      : 'High carbon footprint',
    recyclabilityPoints >= 15 ? 'Highly recyclable material'
      : recyclabilityPoints >= 10 ? 'Moderately recyclable'
      : 'Difficult to recycle',
  ];
  return `${parts.join(', ')}.`;
}

/**
 * Waste earns up to 40 points (40 minus the waste percentage), carbon up
 * to 40 relative to the dirtiest process, recyclability up to 20.
 * Sorted best first; equal scores keep PROCESSES order.
 */
export function scoreProcesses(waste: readonly WasteEstimate[], carbon: readonly CarbonEstimate[]): GreenScore[] {
  const maxCarbon = Math.max(0, ...carbon.map((c) => c.carbonKg)) || 1;
  const scores: GreenScore[] = [];
  for (const process of PROCESSES) {
    const w = waste.find((x) => x.process === process);
    const c = carbon.find((x) => x.process === process);
    if (!w || !c) continue;

    const wastePoints = Math.max(0, 40 - w.wastePercent);
    const carbonPoints = 40 * (1 - c.carbonKg / maxCarbon);
    const recyclabilityPoints = SUSTAINABILITY_CONSTANTS.recyclability[process];
    const score = Math.min(100, Math.max(1, Math.round(wastePoints + carbonPoints + recyclabilityPoints)));
    scores.push({
      process,
      score,
      grade: grade(score),
      wastePoints,
      carbonPoints,
      recyclabilityPoints,
      explanation: explain(wastePoints, carbonPoints, recyclabilityPoints),
    });
  }
  return scores.sort((a, b) => b.score - a.score);
}

/** An everyday activity with roughly the same footprint, or '' below a gram. */
export function carbonEquivalency(carbonKg: number): string {
  if (carbonKg < 0.001) return '';
  for (const [threshold, activity] of CARBON_EQUIVALENCIES) {
    if (carbonKg > threshold * 2) continue;
    const count = carbonKg / threshold;
    if (count < 0.1) continue;
    return count <= 1.2 ? `~ ${activity}` : `~ ${count.toFixed(1)}x ${activity}`;
  }
  return `~ driving ${(carbonKg / 0.41).toFixed(1)} miles`;
}

function savingsTips(
  waste: readonly WasteEstimate[],
  carbon: readonly CarbonEstimate[],
  scores: readonly GreenScore[],
): SavingsTip[] {
  const best = scores[0];
  if (!best) return [];
  const to = best.process;
  const wasteTo = waste.find((w) => w.process === to);
  const carbonTo = carbon.find((c) => c.process === to);
  if (!wasteTo || !carbonTo) return [];

  const tips: SavingsTip[] = [];
  for (const { process: from } of scores.slice(1)) {
    const wasteFrom = waste.find((w) => w.process === from);
    const carbonFrom = carbon.find((c) => c.process === from);
    if (!wasteFrom || !carbonFrom) continue;

    const wasteSavedGrams = wasteFrom.wasteGrams - wasteTo.wasteGrams;
    const carbonSavedKg = carbonFrom.carbonKg - carbonTo.carbonKg;
    tips.push({
      from,
      to,
      wasteSavedGrams,
      carbonSavedKg,
      carbonEquivalency: carbonEquivalency(Math.abs(carbonSavedKg)),
      message:
        `Switching from ${PROCESS_LABELS[from]} to ${PROCESS_LABELS[to]} ` +
        `saves ${Math.abs(wasteSavedGrams).toFixed(1)}g of waste ` +
        `and ${Math.abs(carbonSavedKg).toFixed(3)} kg CO₂.`,
    });
  }
  return tips;
}

// ─── Report ─────────────────────────────────────────────────────

export function sustainabilityReport(part: PartMetrics): SustainabilityReport {
  const waste = PROCESSES.map((p) => estimateWaste(p, part));
  const carbon = PROCESSES.map((p) => estimateCarbon(p, part));
  const scores = scoreProcesses(waste, carbon);
  const best = scores[0];
  return {
    waste,
    carbon,
    scores,
    greenest: best?.process ?? PROCESSES[0],
    recommendation: best
      ? `${PROCESS_LABELS[best.process]} is the greenest option with a score of ${best.score}/100 ` +
        `(Grade ${best.grade}). ${best.explanation}`
      : 'Run analysis first.',
    savingsTips: savingsTips(waste, carbon, scores),
  };
}

// ─── Wire form ──────────────────────────────────────────────────

export interface SustainabilityReportJSON {
  waste_estimates: {
    process: string;
    part_volume_cm3: number;
    raw_material_cm3: number;
    waste_cm3: number;
    waste_percent: number;
    waste_grams: number;
    breakdown: Record<string, number>;
  }[];
  carbon_estimates: {
    process: string;
    part_mass_grams: number;
    energy_kwh: number;
    carbon_kg: number;
    kwh_per_gram: number;
    carbon_factor: number;
  }[];
  green_scores: {
    process: string;
    score: number;
    grade: GreenGrade;
    waste_score: number;
    carbon_score: number;
    recyclability_score: number;
    explanation: string;
  }[];
  greenest_process: string;
  recommendation: string;
  savings_tips: {
    from: string;
    to: string;
    waste_saved_grams: number;
    carbon_saved_kg: number;
    carbon_equivalency: string;
    message: string;
  }[];
}

export function sustainabilityToJSON(r: SustainabilityReport): SustainabilityReportJSON {
  return {
    waste_estimates: r.waste.map((w) => ({
      process: PROCESS_LABELS[w.process],
      part_volume_cm3: round(w.partVolumeCm3, 4),
      raw_material_cm3: round(w.rawMaterialCm3, 4),
      waste_cm3: round(w.wasteCm3, 4),
      waste_percent: round(w.wastePercent, 1),
      waste_grams: round(w.wasteGrams, 2),
      breakdown: w.breakdown,
    })),
    carbon_estimates: r.carbon.map((c) => ({
      process: PROCESS_LABELS[c.process],
      part_mass_grams: round(c.partMassGrams, 2),
      energy_kwh: round(c.energyKwh, 4),
      carbon_kg: round(c.carbonKg, 4),
      kwh_per_gram: SUSTAINABILITY_CONSTANTS.kwhPerGram[c.process],
      carbon_factor: SUSTAINABILITY_CONSTANTS.carbonKgPerKwh,
    })),
    green_scores: r.scores.map((s) => ({
      process: PROCESS_LABELS[s.process],
      score: s.score,
      grade: s.grade,
      waste_score: round(s.wastePoints, 1),
      carbon_score: round(s.carbonPoints, 1),
      recyclability_score: s.recyclabilityPoints,
      explanation: s.explanation,
    })),
    greenest_process: PROCESS_LABELS[r.greenest],
    recommendation: r.recommendation,
    savings_tips: r.savingsTips.map((t) => ({
      from: PROCESS_LABELS[t.from],
      to: PROCESS_LABELS[t.to],
      waste_saved_grams: round(t.wasteSavedGrams, 1),
      carbon_saved_kg: round(t.carbonSavedKg, 3),
      carbon_equivalency: t.carbonEquivalency,
      message: t.message,
    })),
  };
}
