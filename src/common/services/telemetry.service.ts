import { Injectable } from '@nestjs/common';
import { TelemetrySink } from '../types';

/**
 * Fire-and-forget event sink. Events are written to the console as one JSON
 * line each; `severity: HIGH` goes to error, `MEDIUM` to warn, anything else
 * to debug.
 */
@Injectable()
export class TelemetryService implements TelemetrySink {
  record(event: string, attributes: Record<string, unknown>): void {
    try {
      const line = JSON.stringify({
        timestamp: new Date().toISOString(),
        service: 'course-availability',
        event,
        ...attributes,
      });

      const severity = String(attributes.severity || '').toUpperCase();
      if (severity === 'HIGH') {
        console.error(line);
      } else if (severity === 'MEDIUM') {
        console.warn(line);
      } else {
        console.debug(line);
      }
    } catch (error) {
      console.warn(`[TelemetryService] Dropped telemetry event ${event}`, error);
    }
  }
}
