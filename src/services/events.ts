// src/services/events.ts
// Structured observability events, one JSON line each (Cloud Logging format)

export type Severity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export type EventFields = Record<string, string | number | boolean | null | undefined>;

export interface CoreEvent {
  event: string;
  severity: Severity;
  fields: EventFields;
  timestamp: Date;
}

export interface EventSink {
  emit(event: string, severity: Severity, fields?: EventFields): void;
}

export class ConsoleEventSink implements EventSink {
  constructor(private readonly component: string = 'engagement-core') {}

  emit(event: string, severity: Severity, fields: EventFields = {}): void {
    const line = JSON.stringify({
      severity,
      message: event,
      component: this.component,
      ...fields,
      timestamp: new Date().toISOString(),
    });

    if (severity === 'ERROR' || severity === 'WARNING') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/** Keeps events in memory; used by tests and local debugging */
export class RecordingEventSink implements EventSink {
  readonly events: CoreEvent[] = [];

  emit(event: string, severity: Severity, fields: EventFields = {}): void {
    this.events.push({ event, severity, fields, timestamp: new Date() });
  }

  named(event: string): CoreEvent[] {
    return this.events.filter((e) => e.event === event);
  }
}
