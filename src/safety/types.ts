/**
 * Safety Types
 */

import type { HealthStatus } from '../providers/types.js';

/**
 * Outcome of one classification call. Never persisted.
 */
export interface SafetyVerdict {
  isSafe: boolean;
  /** Upper-case category code such as "S10" when the classifier named one */
  category?: string;
  /** Category description, or why the verdict fell back to unsafe */
  reason?: string;
  score?: number;
}

/**
 * Screens user questions and generated answers.
 */
export interface SafetyClassifier {
  checkInput(text: string, signal?: AbortSignal): Promise<SafetyVerdict>;
  checkOutput(text: string, signal?: AbortSignal): Promise<SafetyVerdict>;
  healthCheck(signal?: AbortSignal): Promise<HealthStatus>;
}
