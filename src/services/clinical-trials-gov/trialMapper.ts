/**
 * @fileoverview Flattens a study record into the {@link Trial} row shown to users.
 * @module src/services/clinical-trials-gov/trialMapper
 */

import type { Study, Trial } from './types.js';

/** Shown in the phase column when a study lists no phase. */
export const NO_PHASE = 'N/A';

/**
 * Extracts the trial columns from a study. Each field is looked up and
 * defaulted on its own: missing text becomes `''`, missing lists become `[]`.
 */
export function toTrial(study: Study): Trial {
  const protocol = study.protocolSection;
  const identification = protocol?.identificationModule;
  const phases = protocol?.designModule?.phases ?? [];

  return {
    nctId: identification?.nctId ?? '',
    title: identification?.briefTitle ?? '',
    phase: phases.length > 0 ? phases.join(', ') : NO_PHASE,
    status: protocol?.statusModule?.overallStatus ?? '',
    sponsor: protocol?.sponsorCollaboratorsModule?.leadSponsor?.name ?? '',
    conditions: [...(protocol?.conditionsModule?.conditions ?? [])],
    interventions: (protocol?.armsInterventionsModule?.interventions ?? [])
      .map((intervention) => intervention.name)
      .filter((name): name is string => Boolean(name)),
  };
}
