import { Injectable, Logger } from '@nestjs/common';
import * as chrono from 'chrono-node';
import type { TemporalResult } from './temporal.types';

@Injectable()
export class TemporalService {
  private readonly logger = new Logger(TemporalService.name);

  /**
   * Extracts the first English temporal expression from a text.
   * @param referenceDate Anchor for relative expressions (defaults to now)
   * @returns null when the text carries no date
   */
  parse(text: string, referenceDate?: Date): TemporalResult | null {
    const ref = referenceDate ?? new Date();
    const results = chrono.parse(text, ref, { forwardDate: true });

    if (results.length === 0) {
      return null;
    }

    const first = results[0];
    this.logger.debug(
      `Temporal expression found: "${first.text}" → ${first.start.date().toISOString()}`,
    );

    return {
      expression: first.text,
      resolvedDate: first.start.date().toISOString(),
    };
  }
}
