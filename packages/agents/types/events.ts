// Domain events emitted while a session runs
// Used by front ends for live progress; never needed for control flow

import { randomUUID } from 'node:crypto';
import { describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type DomainEventType =
  // Step Runner
  | 'StepStarted'
  | 'StepCompleted'
  | 'StepFailed'
  // Pipelines
  | 'CompanyAnalysisCompleted'
  | 'CompanyAnalysisFailed'
  | 'ComparisonCompleted'
  | 'ChartSkipped'
  // Memory
  | 'SessionPersisted'
  | 'PersistFailed';

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // component that emitted it
  payload: T;
}

export type EventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: EventHandler): void;
  off(type: DomainEventType, handler: EventHandler): void;
}

// Simple in-process event bus implementation
// A throwing handler is logged and skipped; emit() itself never throws.
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<EventHandler>>();

  constructor(private readonly log: Logger = createLogger('EventBus')) {}

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        try {
          handler(event);
        } catch (err) {
          this.log.warn(`${event.type} handler failed`, {
            sourceContext: event.sourceContext,
            error: describeError(err),
          });
        }
      }
    }
  }

  on(type: DomainEventType, handler: EventHandler): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: EventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }
}

export const ALL_EVENT_TYPES: readonly DomainEventType[] = [
  'StepStarted', 'StepCompleted', 'StepFailed',
  'CompanyAnalysisCompleted', 'CompanyAnalysisFailed',
  'ComparisonCompleted', 'ChartSkipped',
  'SessionPersisted', 'PersistFailed',
];

/** Subscribe a single catch-all hook to every event type. */
export function subscribeAll(
  bus: EventBus,
  handler: (event: { type: DomainEventType; payload: unknown }) => void,
): void {
  for (const type of ALL_EVENT_TYPES) {
    bus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
  }
}

/** Emit on an optional bus, stamping id and time. */
export function publish(
  bus: EventBus | undefined,
  type: DomainEventType,
  sourceContext: string,
  payload: Record<string, unknown>,
): void {
  bus?.emit({ eventId: randomUUID(), type, timestamp: new Date(), sourceContext, payload });
}
