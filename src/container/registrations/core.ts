/**
 * @fileoverview Registers core application services with the DI container:
 * configuration, logging, the ClinicalTrials.gov provider and the search service.
 * @module src/container/registrations/core
 */
import { config as parsedConfig } from '../../config/index.js';
import { ClinicalTrialsGovProvider } from '../../services/clinical-trials-gov/providers/clinicaltrials-gov.provider.js';
import { TrialSearchService } from '../../services/clinical-trials-gov/trialSearch.service.js';
import { logger } from '../../utils/index.js';
import { container } from '../core/container.js';
import {
  AppConfig,
  ClinicalTrialsProvider,
  Logger,
  TrialSearch,
} from '../core/tokens.js';

/**
 * Registers core application services and values with the container.
 */
export const registerCoreServices = () => {
  container.registerValue(AppConfig, parsedConfig);
  container.registerValue(Logger, logger);

  // ClinicalTrials.gov Provider
  container.registerSingleton(ClinicalTrialsProvider, (c) => {
    const cfg = c.resolve(AppConfig);
    return new ClinicalTrialsGovProvider({
      baseUrl: cfg.clinicalTrials.baseUrl,
      timeoutMs: cfg.clinicalTrials.timeoutMs,
    });
  });

  // Search service — one instance; holds no per-search state
  container.registerSingleton(TrialSearch, (c) => {
    const cfg = c.resolve(AppConfig);
    return new TrialSearchService(c.resolve(ClinicalTrialsProvider), {
      maxResults: cfg.search.maxResults,
      pageSize: cfg.search.apiPageSize,
    });
  });

  logger.info('Core services registered with the DI container.');
};
