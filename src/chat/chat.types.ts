import type { OrchestrationResult } from '../coordinator/coordinator.types';

export interface ChatTurnResponse extends OrchestrationResult {
  sessionId: string;
}
