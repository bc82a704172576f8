import { Injectable } from '@nestjs/common';
import { BaseAgent } from '../base.agent';
import {
  type AgentInput,
  type AgentOutput,
  PrivacyMode,
  StageName,
} from '../agent.types';
import { detectPii, redact, type PrivacyViolation } from './pii-detector';

export interface PrivacyCheck {
  /** False when the requested profile differs from the one bound to the session. */
  allowed: boolean;
  warnings: string[];
  sanitizedMode: PrivacyMode;
  sanitizedMessage: string;
  violations: PrivacyViolation[];
}

/**
 * Rule-based screening of the user message. Never blocks a turn: findings
 * become warnings, and in incognito they are redacted before generation.
 */
@Injectable()
export class PrivacyGuardianAgent extends BaseAgent<PrivacyCheck> {
  readonly stage = StageName.PRIVACY_GUARDIAN;

  protected async execute(
    input: AgentInput,
  ): Promise<AgentOutput<PrivacyCheck>> {
    const warnings: string[] = [];
    const boundProfile = input.context.sessionProfileId ?? null;
    const isolationOk =
      boundProfile === null || boundProfile === input.profileId;

    if (!isolationOk) {
      this.logger.warn(
        `[${input.sessionId}] Profile isolation violation: requested=${input.profileId ?? 'default'} session=${boundProfile}`,
      );
      warnings.push(
        `This session is bound to profile "${boundProfile}"; memory access for profile "${input.profileId ?? 'default'}" was denied and the turn runs in incognito mode.`,
      );
    }

    const mode = isolationOk ? input.privacyMode : PrivacyMode.INCOGNITO;
    const violations = detectPii(input.message);
    warnings.push(...this.warningsFor(mode, violations));

    if (violations.length > 0) {
      this.logger.warn(
        `[${input.sessionId}] ${violations.length} privacy finding(s) in ${mode} mode: ${violations
          .map((v) => `${v.type}/${v.severity}`)
          .join(', ')}`,
      );
    }

    return this.ok(
      {
        allowed: isolationOk,
        warnings,
        sanitizedMode: mode,
        sanitizedMessage:
          mode === PrivacyMode.INCOGNITO
            ? redact(input.message, violations)
            : input.message,
        violations,
      },
      0,
      warnings,
    );
  }

  private warningsFor(
    mode: PrivacyMode,
    violations: PrivacyViolation[],
  ): string[] {
    const high = violations.filter((v) => v.severity === 'high');
    const medium = violations.filter((v) => v.severity === 'medium');

    switch (mode) {
      case PrivacyMode.NORMAL: {
        const warnings: string[] = [];
        if (high.length > 0) {
          warnings.push(
            `Detected ${high.length} high-severity sensitive item(s) (e.g. ${high[0].type}). This will be stored in your memory profile.`,
          );
        }
        if (medium.length > 0) {
          warnings.push(
            `Detected ${medium.length} medium-severity sensitive item(s). This will be stored in your memory profile.`,
          );
        }
        return warnings;
      }
      case PrivacyMode.INCOGNITO: {
        if (violations.length === 0) return [];
        const warnings = [
          `Detected ${violations.length} sensitive item(s). Sensitive data has been redacted and will not be stored.`,
        ];
        if (high.length > 0) {
          warnings.push(
            `High-severity data flagged: ${high.map((v) => v.type).join(', ')}.`,
          );
        }
        return warnings;
      }
      case PrivacyMode.PAUSE_MEMORIES:
        return violations.length > 0
          ? [
              `Memory paused: detected ${violations.length} sensitive item(s). This information will not be saved to your memory profile.`,
            ]
          : ['Memory paused: new information from this turn will not be saved.'];
    }
  }
}
