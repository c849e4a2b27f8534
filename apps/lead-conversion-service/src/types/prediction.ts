/**
 * Lead Conversion Prediction Types
 * Shared by the prediction service and the client adapter
 */

// ============================================================================
// WIRE TYPES
// ============================================================================

/** 0 = lead does not convert, 1 = lead converts */
export type ClassLabel = 0 | 1;

/** [P(class = 0), P(class = 1)] */
export type ProbabilityPair = [number, number];

export interface PredictionResponse {
  prediction: ClassLabel[];
  probability: ProbabilityPair[];
}

export interface ErrorResponse {
  detail: string;
}

export interface HealthResponse {
  message: string;
}

// ============================================================================
// SERVICE LIFECYCLE
// ============================================================================

export type ServiceState = "Loading" | "Ready";

export function isClassLabel(value: unknown): value is ClassLabel {
  return value === 0 || value === 1;
}
