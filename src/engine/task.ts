/**
 * @fileoverview Task model.
 *
 * Inputs are tagged by category so every category declares exactly the fields
 * it uses. Status only moves forward:
 *
 *   PENDING -> RUNNING -> DONE | FAILED
 *   PENDING -> BLOCKED
 *
 * Every transition appends a history event; history is append-only.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { TaskStateError } from '../core/errors.js';
import type { FailReason, ResolvedStatus, ProposedStatus, ValidatedCitation } from '../types.js';

// ============================================================================
// INPUTS
// ============================================================================

export const TaskInputsSchema = z.discriminatedUnion('category', [
  z.object({ category: z.literal('generic'), goal: z.string().min(1) }),
  z.object({ category: z.literal('paper_survey'), query: z.string().min(1), maxPapers: z.number().int().positive().optional() }),
  z.object({ category: z.literal('thesis'), topic: z.string().min(1), chapter: z.string().optional() }),
  z.object({ category: z.literal('job_hunting'), role: z.string().min(1), location: z.string().optional() }),
]);

export type TaskInputs = z.infer<typeof TaskInputsSchema>;
export type TaskCategory = TaskInputs['category'];

/** Free-text summary of a task's inputs, for prompts and logs. */
export function describeInputs(inputs: TaskInputs): string {
  switch (inputs.category) {
    case 'generic':
      return inputs.goal;
    case 'paper_survey':
      return inputs.maxPapers === undefined ? inputs.query : `${inputs.query} (max ${inputs.maxPapers} papers)`;
    case 'thesis':
      return inputs.chapter ? `${inputs.topic} / ${inputs.chapter}` : inputs.topic;
    case 'job_hunting':
      return inputs.location ? `${inputs.role} @ ${inputs.location}` : inputs.role;
  }
}

// ============================================================================
// STATUS
// ============================================================================

export type TaskStatus = 'PENDING' | 'RUNNING' | 'DONE' | 'FAILED' | 'BLOCKED';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  PENDING: ['RUNNING', 'BLOCKED'],
  RUNNING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
  BLOCKED: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

// ============================================================================
// HISTORY
// ============================================================================

export interface CompletePayload {
  agentStatus: ResolvedStatus;
  proposedStatus?: ProposedStatus;
  qualityWarnings: string[];
  attempts: number;
  answer: string;
  citations: ValidatedCitation[];
  failReasons: FailReason[];
  evaluationErrors: string[];
}

export interface RetryPayload {
  attempt: number;
  reason: string;
  remediation: string[];
  delayMs: number;
}

export interface BlockedPayload {
  blockedBy: string;
}

interface HistoryEventBase<E extends string, S extends TaskStatus, P> {
  event: E;
  status: S;
  payload: P;
  /** ISO-8601 */
  at: string;
}

export type TaskHistoryEvent =
  | HistoryEventBase<'start', 'RUNNING', Record<string, never>>
  | HistoryEventBase<'retry', 'RUNNING', RetryPayload>
  | HistoryEventBase<'complete', 'DONE' | 'FAILED', CompletePayload>
  | HistoryEventBase<'blocked', 'BLOCKED', BlockedPayload>;

// ============================================================================
// TASK
// ============================================================================

export interface TaskInit {
  id?: string;
  title: string;
  inputs: TaskInputs;
  priority?: number;
}

export class Task {
  readonly id: string;
  readonly title: string;
  readonly inputs: TaskInputs;
  readonly priority: number;
  private currentStatus: TaskStatus = 'PENDING';
  private readonly events: TaskHistoryEvent[] = [];

  constructor(init: TaskInit) {
    this.id = init.id ?? `task_${randomUUID()}`;
    this.title = init.title;
    this.inputs = TaskInputsSchema.parse(init.inputs);
    this.priority = init.priority ?? 0;
  }

  get status(): TaskStatus {
    return this.currentStatus;
  }

  get history(): readonly TaskHistoryEvent[] {
    return this.events;
  }

  /** Last `complete` payload, if the task finished. */
  get completion(): CompletePayload | undefined {
    for (let i = this.events.length - 1; i >= 0; i -= 1) {
      const event = this.events[i];
      if (event?.event === 'complete') return event.payload;
    }
    return undefined;
  }

  start(): void {
    this.transition('RUNNING');
    this.events.push({ event: 'start', status: 'RUNNING', payload: {}, at: now() });
  }

  recordRetry(payload: RetryPayload): void {
    if (this.currentStatus !== 'RUNNING') {
      throw new TaskStateError(this.id, this.currentStatus, 'RUNNING');
    }
    this.events.push({ event: 'retry', status: 'RUNNING', payload, at: now() });
  }

  complete(status: 'DONE' | 'FAILED', payload: CompletePayload): void {
    this.transition(status);
    this.events.push({ event: 'complete', status, payload, at: now() });
  }

  block(blockedBy: string): void {
    this.transition('BLOCKED');
    this.events.push({ event: 'blocked', status: 'BLOCKED', payload: { blockedBy }, at: now() });
  }

  private transition(to: TaskStatus): void {
    if (!canTransition(this.currentStatus, to)) {
      throw new TaskStateError(this.id, this.currentStatus, to);
    }
    this.currentStatus = to;
  }
}

function now(): string {
  return new Date().toISOString();
}
