export type ProgressSeverity = 'info' | 'success' | 'error';

export interface ProgressEvent {
  readonly message: string;
  readonly severity: ProgressSeverity;
}

/**
 * Observer for human-readable status messages. Purely observational: conversion never
 * depends on what a sink does, and a sink that throws does not stop it.
 */
export interface ProgressSink {
  notify(event: ProgressEvent): void;
}
