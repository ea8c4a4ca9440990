import { describe, it, expect } from 'vitest';
import {
  carbonEquivalency, estimateCarbon, estimateWaste, sustainabilityReport, sustainabilityToJSON,
} from '../src/index.js';
import { PLATE } from './fixtures.js';

describe('estimateWaste', () => {
  it('counts supports and failed prints for FDM', () => {
    const w = estimateWaste('fdm', PLATE);
    expect(w.rawMaterialCm3).toBeCloseTo(11.8, 9);
    expect(w.wastePercent).toBeCloseTo(15.2542, 4);
    expect(w.wasteGrams).toBeCloseTo(2.232, 9);
    expect(w.breakdown).toEqual({ supports: 1.24, failed_prints: 0.99 });
  });

  it('charges CNC for the whole bounding-box stock', () => {
    const w = estimateWaste('cnc', PLATE);
    expect(w.rawMaterialCm3).toBe(18);
    expect(w.wasteCm3).toBe(8);
    expect(w.wastePercent).toBeCloseTo(44.4444, 4);
    expect(w.breakdown).toEqual({ machining_chips: 21.6 });
  });

  it('assumes 50% stock overhead when the box is smaller than the part', () => {
    const w = estimateWaste('cnc', { volumeCm3: 2, faceCount: 6 });
    expect(w.rawMaterialCm3).toBe(3);
    expect(w.wasteCm3).toBe(1);
  });

  it('loses only runners and sprues to injection molding', () => {
    const w = estimateWaste('injection_molding', PLATE);
    expect(w.wasteCm3).toBe(0.5);
    expect(w.breakdown).toEqual({ runner_sprue: 0.52 });
  });
});

describe('estimateCarbon', () => {
  it('converts mass to energy to CO2', () => {
    const c = estimateCarbon('cnc', PLATE);
    expect(c.partMassGrams).toBeCloseTo(27, 9);
    expect(c.energyKwh).toBeCloseTo(5.94, 9);
    expect(c.carbonKg).toBeCloseTo(2.376, 9);
    expect(estimateCarbon('injection_molding', PLATE).carbonKg).toBeCloseTo(0.1248, 9);
  });
});

describe('sustainabilityReport', () => {
  const report = sustainabilityReport(PLATE);

  it('ranks processes by green score', () => {
    expect(report.scores.map((s) => [s.process, s.score, s.grade])).toEqual([
      ['injection_molding', 85, 'A'],
      ['fdm', 74, 'B'],
      ['sla', 65, 'B'],
      ['cnc', 20, 'F'],
    ]);
    expect(report.greenest).toBe('injection_molding');
  });

  it('gives the dirtiest process no carbon points', () => {
    const cnc = report.scores[3];
    expect(cnc.wastePoints).toBe(0);
    expect(cnc.carbonPoints).toBe(0);
    expect(cnc.explanation).toBe('High material waste, High carbon footprint, Highly recyclable material.');
  });

  it('explains the recommendation', () => {
    expect(report.recommendation).toBe(
      'Injection Molding is the greenest option with a score of 85/100 (Grade A). ' +
      'Very low waste, Low carbon footprint, Moderately recyclable.',
    );
  });

  it('suggests switching every other process to the greenest', () => {
    expect(report.savingsTips.map((t) => [t.from, t.to, t.carbonEquivalency])).toEqual([
      ['fdm', 'injection_molding', '~ driving 1 mile'],
      ['sla', 'injection_molding', '~ driving 1 mile'],
      ['cnc', 'injection_molding', '~ a gallon of gasoline burned'],
    ]);
    expect(report.savingsTips[0].message).toBe(
      'Switching from FDM to Injection Molding saves 1.7g of waste and 0.222 kg CO₂.',
    );
  });

  it('serializes with process labels and rounded figures', () => {
    const json = sustainabilityToJSON(report);
    expect(json.greenest_process).toBe('Injection Molding');
    expect(json.green_scores[0]).toEqual({
      process: 'Injection Molding',
      score: 85,
      grade: 'A',
      waste_score: 35.2,
      carbon_score: 37.9,
      recyclability_score: 12,
      explanation: 'Very low waste, Low carbon footprint, Moderately recyclable.',
    });
    expect(json.savings_tips[2]).toMatchObject({ from: 'CNC', waste_saved_grams: 21.1, carbon_saved_kg: 2.251 });
    expect(json.carbon_estimates[0]).toMatchObject({ process: 'FDM', carbon_kg: 0.3472, kwh_per_gram: 0.07 });
  });
});

describe('carbonEquivalency', () => {
  it('finds the closest everyday activity', () => {
    expect(carbonEquivalency(0.0005)).toBe('');
    expect(carbonEquivalency(0.02)).toBe('~ streaming video for 1 hour');
    expect(carbonEquivalency(0.06)).toBe('~ 1.7x streaming video for 1 hour');
    expect(carbonEquivalency(10)).toBe('~ driving 24.4 miles');
  });
});
