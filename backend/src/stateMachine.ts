/**
 * Render job lifecycle.
 *
 *   PENDING → PROCESSING → COMPLETED
 *                  ↘
 *                   FAILED
 *
 * COMPLETED and FAILED are terminal. Every job passes through PROCESSING,
 * including one cancelled or lost from the queue before a worker took it.
 */

import { StateTransitionError } from './errors';

export enum JobStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

const validTransitions: Record<JobStatus, ReadonlySet<JobStatus>> = {
  [JobStatus.PENDING]: new Set([JobStatus.PROCESSING]),
  [JobStatus.PROCESSING]: new Set([JobStatus.COMPLETED, JobStatus.FAILED]),
  [JobStatus.COMPLETED]: new Set<JobStatus>(),
  [JobStatus.FAILED]: new Set<JobStatus>(),
};

export function isValidTransition(from: JobStatus, to: JobStatus): boolean {
  return validTransitions[from].has(to);
}

export function isTerminal(status: JobStatus): boolean {
  return validTransitions[status].size === 0;
}

/**
 * States a job must currently be in for a move to `to` to be legal.
 */
export function sourceStatesFor(to: JobStatus): JobStatus[] {
  return Object.values(JobStatus).filter(from => isValidTransition(from, to));
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!isValidTransition(from, to)) {
    throw new StateTransitionError(jobId, from, to);
  }
}

export function isJobStatus(value: string): value is JobStatus {
  return Object.values(JobStatus).some(status => status === value);
}
