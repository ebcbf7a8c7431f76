import type { JumpRules, MissionKind } from '../../shared/types';

export const AU_TO_KM = 149597870.7;

// --- JUMP COSTS ---
export const JUMP_FUEL_COST_BASE = 100;
export const JUMP_FUEL_COST_PER_SHIP = 10;
export const JUMP_FUEL_MASS_REFERENCE = 1000;
// Fuel efficiency gained per size class step
export const JUMP_SIZE_CLASS_EFFICIENCY = 0.8;
export const JUMP_TIME_BASE = 30; // seconds

// --- JUMP PREPARATION ---
export const JUMP_PREPARATION_BASE_TIME = 30;
export const JUMP_PREPARATION_PER_SHIP = 5;
export const JUMP_PREPARATION_INSTABILITY_PENALTY = 10;
export const JUMP_PREPARATION_MIN_TIME = 10;
export const JUMP_TRAVEL_TIME_JITTER = 0.1;
export const JUMP_ARRIVAL_OFFSET_KM = 1000;

// --- SURVEY LEVELS ---
export const SURVEY_LEVEL_DETECTED = 1;
export const SURVEY_LEVEL_TRAVEL = 2;
export const SURVEY_LEVEL_MAX = 3;

// --- EXPLORATION ---
export const EXPLORATION_BASE_TIME = 3600;
export const SURVEY_BASE_TIME = 7200;
export const MISSION_BASE_TIMES: Record<MissionKind, number> = {
  explore: EXPLORATION_BASE_TIME,
  survey: SURVEY_BASE_TIME,
  deep_scan: SURVEY_BASE_TIME * 2
};
export const MISSION_MIN_DURATION = 60;

export const FLEET_CAPABILITY_PER_SHIP = 0.1;
export const FLEET_CAPABILITY_MIN = 0.5;

export const SYSTEM_DIFFICULTY_MIN = 0.5;
export const SYSTEM_DIFFICULTY_MAX = 3.0;

export const DETECTION_PROBABILITY_MIN = 0.01;
export const DETECTION_PROBABILITY_MAX = 0.95;
export const DETECTION_DISTANCE_FACTOR_MIN = 0.1;
export const DETECTION_EXPERIENCE_BONUS = 0.5;

// Per-tick rolls during a mission
export const MISSION_DETECTION_THRESHOLD = 0.3;
export const MISSION_DETECTION_CHANCE = 0.1;
export const MISSION_ANOMALY_THRESHOLD = 0.7;
export const MISSION_ANOMALY_CHANCE = 0.05;

// Hidden pool: one point at 40%, then two more independent 15% rolls
export const HIDDEN_FIRST_POINT_CHANCE = 0.4;
export const HIDDEN_EXTRA_POINT_ROLLS = 2;
export const HIDDEN_EXTRA_POINT_CHANCE = 0.15;
export const HIDDEN_POINT_RADIUS_AU: [number, number] = [3, 8];

// --- NETWORK GENERATION ---
export const DEFAULT_CONNECTIVITY_LEVEL = 0.3;
export const JUMP_POINT_RADIUS_AU: [number, number] = [2, 6];
export const UNSTABLE_JUMP_POINT_CHANCE = 0.2;
export const DORMANT_JUMP_POINT_CHANCE = 0.1;
export const SECONDARY_LINK_DISTANCE_SCALE = 10;
export const SECONDARY_LINK_MIN_CHANCE = 0.1;
export const DEFAULT_REACH_HOPS = 5;

export const DEFAULT_HISTORY_QUERY_LIMIT = 10;

export const DEFAULT_JUMP_RULES: JumpRules = {
  detectionRangeAu: 10,
  baseDetectionChance: 0.3,
  hiddenDetectionFactor: 0.5,
  minimumJumpFuel: 20,
  jumpHistoryLimit: 50
};
