/**
 * TypeScript interfaces for the orchestrator
 */

import { SpecialistDomain } from '../types';

export interface ClassificationResult {
  domain: SpecialistDomain;
  /** Winning score over the sum of all domain scores, 0 when nothing matched. */
  confidence: number;
  score: number;
  /** False when no domain matched and the query fell through to the default domain. */
  matched: boolean;
  scores: Record<SpecialistDomain, number>;
}

export interface RoutedAnswer {
  domain: SpecialistDomain;
  classification: ClassificationResult;
  respuesta: string;
}

/**
 * How the orchestrator reaches a specialist.
 */
export interface SpecialistClient {
  readonly domain: SpecialistDomain;
  ask(pregunta: string): Promise<string>;
}

export type SpecialistClients = Record<SpecialistDomain, SpecialistClient>;
