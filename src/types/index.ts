/**
 * Core types for the space missions loader
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Missions
// ═══════════════════════════════════════════════════════════════════════════════

export interface Mission {
  missionId: string;
  missionName: string | null;
  launchDate: string | null;
  launchYear: number | null;
  targetType: string | null;
  targetName: string | null;
  missionType: string | null;
  distanceLy: number | null;
  durationYears: number | null;
  costBillionUsd: number | null;
  scientificYield: number | null;
  crewSize: number | null;
  successPct: number | null;
  fuelConsumptionTons: number | null;
  payloadWeightTons: number | null;
  launchVehicle: string | null;
}

export interface MissionFilters {
  missionTypes?: string[];
  targetTypes?: string[];
  launchVehicles?: string[];
  yearRange?: [number, number];
}

export interface MissionFilterOptions {
  missionTypes: string[];
  targetTypes: string[];
  launchVehicles: string[];
  yearRange: [number, number];
}

export interface MissionSummary {
  totalMissions: number;
  avgCostBillionUsd: number | null;
  avgSuccessPct: number | null;
  topLaunchVehicle: string | null;
  missionsByTargetType: { targetType: string | null; missions: number }[];
  successByMissionType: { missionType: string | null; avgSuccessPct: number | null }[];
  missionsByYear: { launchYear: number | null; missions: number }[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Auxiliary datasets
// ═══════════════════════════════════════════════════════════════════════════════

export type AuxiliarySource = 'APOD' | 'NEO' | 'Exoplanet Archive' | 'Earth Imagery';

export interface ApodEntry {
  date: string;
  title: string | null;
  explanation: string;
  url: string | null;
  mediaType: string | null;
  source: 'APOD';
}

export interface NeoEntry {
  date: string;
  name: string;
  diameterKm: number | null;
  hazardous: boolean;
  velocityKms: number | null;
  source: 'NEO';
}

export interface ExoplanetEntry {
  name: string;
  planetCount: number | null;
  radiusEarth: number | null;
  massEarth: number | null;
  distancePc: number | null;
  discoveryYear: number | null;
  source: 'Exoplanet Archive';
}

export interface EarthImageryEntry {
  location: string;
  latitude: number;
  longitude: number;
  url: string;
  source: 'Earth Imagery';
}

/**
 * Result of one auxiliary sub-operation. `error` is set when the fetch
 * failed and `records` is then empty.
 */
export interface FetchOutcome<T> {
  source: AuxiliarySource;
  records: T[];
  error?: string;
}

export interface AuxiliaryData {
  apod: FetchOutcome<ApodEntry>;
  neo: FetchOutcome<NeoEntry>;
  exoplanet: FetchOutcome<ExoplanetEntry>;
  earthImagery: FetchOutcome<EarthImageryEntry>;
}

export interface AuxiliaryCounts {
  apod: number;
  neo: number;
  exoplanet: number;
  earthImagery: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline
// ═══════════════════════════════════════════════════════════════════════════════

export type EnsureReadyStatus = 'loaded' | 'skipped';

export type LoadReason = 'empty' | 'forced' | 'source_changed';

export interface EnsureReadyResult {
  status: EnsureReadyStatus;
  reason: LoadReason | 'already_populated';
  dbPath: string;
  missions: number;
  auxiliary: AuxiliaryCounts;
  fetchErrors: Partial<Record<keyof AuxiliaryData, string>>;
  durationMs: number;
}

export interface AuxiliaryRefreshResult {
  auxiliary: AuxiliaryCounts;
  fetchErrors: Partial<Record<keyof AuxiliaryData, string>>;
  pruned: number;
  durationMs: number;
}
