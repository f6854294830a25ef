import { RolloutSettings } from '../types/index.js';

export const DEFAULT_DISPLAY_NAME_PARAMETER = 'AccountName';

/**
 * Defaults for pacing a rollout. Instance operations are polled every 20s
 * (40 checks), definition updates every 15s.
 */
export const DEFAULT_ROLLOUT_SETTINGS: RolloutSettings = {
  pollIntervalMs: 20_000,
  definitionPollIntervalMs: 15_000,
  maxPollAttempts: 40,
  conflictBackoffMs: 30_000,
  writeConflictBackoffMs: 60_000,
  interStepPauseMs: 10_000,
  failureBackoffMs: 30_000,
  maxTargetAttempts: 3,
  maxConsecutiveReadFailures: 5,
  capabilities: ['CAPABILITY_IAM', 'CAPABILITY_NAMED_IAM'],
};

export function resolveSettings(overrides: Partial<RolloutSettings> = {}): RolloutSettings {
  const settings: RolloutSettings = { ...DEFAULT_ROLLOUT_SETTINGS };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(settings, { [key]: value });
    }
  }
  return settings;
}
