/**
 * @fileoverview Typed DI tokens for the application.
 * Each token carries its resolved type via the phantom `Token<T>` parameter,
 * enabling fully type-safe container resolution without casts.
 * @module src/container/core/tokens
 */
import { token } from './container.js';

import type { AppConfig as AppConfigType } from '../../config/index.js';
import type { IClinicalTrialsProvider } from '../../services/clinical-trials-gov/core/IClinicalTrialsProvider.js';
import type { TrialSearchService } from '../../services/clinical-trials-gov/trialSearch.service.js';
import type { Logger as LoggerType } from '../../utils/index.js';

// --- Core service tokens ---
export const AppConfig = token<AppConfigType>('AppConfig');
export const Logger = token<LoggerType>('Logger');

// --- Service tokens ---
export const ClinicalTrialsProvider = token<IClinicalTrialsProvider>(
  'IClinicalTrialsProvider',
);
export const TrialSearch = token<TrialSearchService>('TrialSearchService');
