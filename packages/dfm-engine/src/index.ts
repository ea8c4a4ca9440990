// Public API

// Geometry
export type { Vec3, BoundingBox } from './vec3.js';
export type { Body, Face, Edge, Wall, Hole, FaceKind, EdgeKind, GeometrySnapshot } from './geometry.js';
export type { FeatureRef } from './feature-ref.js';
export { formatFeatureRef, parseFeatureRef } from './feature-ref.js';
export { parseBody, parseFaces, parseEdges, parseHoles, detectWalls, buildSnapshot } from './snapshot.js';
export type { SnapshotPayloads } from './snapshot.js';
export { GeometrySession } from './session.js';

// Rules
export { PROCESSES, PROCESS_LABELS, SEVERITIES, RULE_CATEGORIES, checkRule, ruleAppliesTo, formatRuleMessage } from './rules.js';
export type { Process, ProcessScope, Severity, RuleCategory, Comparison, DfmRule, RuleRecordInput } from './rules.js';
export { RuleRegistry, DEFAULT_RULES_PATH } from './registry.js';
export { DrillCatalog, DEFAULT_DRILLS_PATH } from './drills.js';

// Analysis
export { runAnalyzers, checkWalls, checkCorners, checkHoles, checkOverhangs, cornerRadius, overhangAngle } from './analyzers/index.js';
export type { Violation, ViolationJSON } from './violation.js';
export { violationOf, violationKey, violationToJSON } from './violation.js';
export type { ViolationReport, ViolationReportJSON, RecommendableProcess } from './report.js';
export {
  buildReport, recommendProcess, processScores, systemFailureReport, countBySeverity, reportToJSON,
  SEVERITY_WEIGHT, RECOMMENDABLE_PROCESSES,
} from './report.js';
export { analyzeSnapshot } from './analyze.js';
export type { PartFeature, HoleSubtype } from './features.js';
export { extractFeatures, featureToJSON, holeSubtype } from './features.js';

// Costs
export type { CostEstimate, CostEstimateJSON, PartMetrics } from './cost.js';
export { estimateCost, estimateAll, unitCost, unitCostAt, costToJSON, COST_CONSTANTS } from './cost.js';
export type { QuantityPoint, QuantityCurves, Crossover } from './quantity.js';
export { quantityCurve, quantityCurves, findCrossover, findCrossovers, STANDARD_QUANTITIES, MAX_QUANTITY } from './quantity.js';
export type { CostComparison, CostComparisonJSON } from './comparison.js';
export { compareCosts, comparisonToJSON } from './comparison.js';

// Sustainability
export type {
  WasteEstimate, CarbonEstimate, GreenScore, GreenGrade, SavingsTip, SustainabilityReport, SustainabilityReportJSON,
} from './sustainability.js';
export {
  estimateWaste, estimateCarbon, scoreProcesses, carbonEquivalency, sustainabilityReport, sustainabilityToJSON,
  SUSTAINABILITY_CONSTANTS,
} from './sustainability.js';

// Recommendation
export type { MaterialRecord, MachineRecord } from './catalogs.js';
export { MaterialCatalog, MachineCatalog, DEFAULT_MATERIALS_PATH, DEFAULT_MACHINES_PATH } from './catalogs.js';
export type {
  MaterialAxis, MaterialWeights, MaterialMatch, MaterialMatchJSON,
  MachinePriorities, MachineQuery, MachineMatch, MachineMatchJSON,
} from './recommend.js';
export {
  matchMaterials, matchMachines, spiderChart, canFit, partSizeMm, materialMatchToJSON, machineMatchToJSON,
  MATERIAL_AXES, DEFAULT_MATERIAL_WEIGHTS, DEFAULT_MACHINE_PRIORITIES,
} from './recommend.js';

// Process switching
export type { RedesignStep, RedesignStepJSON, Effort } from './redesign.js';
export { planRedesign, stepToJSON, CATEGORY_PRIORITY } from './redesign.js';
export type { ProcessSwitch, ProcessSwitchJSON } from './simulator.js';
export { simulateSwitch, switchSummary, switchToJSON } from './simulator.js';

// Engine
export { DfmEngine } from './engine.js';

// CAD hosts
export type { CadHost, HostPayload, ResizeCircleCommand, AdjustCutDepthCommand, FilletCommand } from './host/host.js';
export { HttpCadHost } from './host/http-host.js';
export type { HttpHostOptions } from './host/http-host.js';
export { MemoryCadHost } from './host/memory-host.js';
export type { MemoryPart, MemoryFace, MemoryEdge, MemoryHole, MemoryCut, MemoryCommand } from './host/memory-host.js';

// Fixes
export type { FixResult, FixResultJSON, FixPlan, ApplyOutcome, SagaContext } from './fixes/saga.js';
export { runSaga, validateWithRetry, failedFix, fixResultToJSON } from './fixes/saga.js';
export { holeFixPlan } from './fixes/hole-fix.js';
export { wallFixPlan } from './fixes/wall-fix.js';
export { cornerFixPlan, sharpConcaveEdges, MIN_FILLET_MM } from './fixes/corner-fix.js';
export { FixOrchestrator } from './fixes/orchestrator.js';

// Ambient
export { loadConfig } from './config.js';
export type { Config, HostConfig, FixPolicy } from './config.js';
export { createLogger, setLogLevel } from './log.js';
export type { Logger, LogLevel } from './log.js';
export { RuleLoadError, HostError, HostConnectionError, StaleReferenceError, errorMessage } from './errors.js';
