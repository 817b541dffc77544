/**
 * Configuration types for Threatline.
 */

import type { LogLevel } from '../utils/logger.js';

export interface ThreatlineConfig {
  storage: StorageConfig;
  analysis: AnalysisDefaults;
  rulesPath: string;
  referenceDataPath: string;
  logging: LogConfig;
}

export interface StorageConfig {
  basePath: string;
  uploadsDir: string;
  resultsDir: string;
}

export interface AnalysisDefaults {
  maxEvents: number;
  timeoutMinutes: number;
}

export interface LogConfig {
  level: LogLevel;
}
