/**
 * Shared types for the specialist and orchestrator agents
 */

export enum SpecialistDomain {
  CONSULTAS = 'consultas',
  CUENTAS = 'cuentas',
  IDENTIDAD = 'identidad',
  IA = 'ia'
}

// Deployment order; SPECIALIST_ENDPOINTS lists base URLs in this order
export const SPECIALIST_DOMAINS: readonly SpecialistDomain[] = [
  SpecialistDomain.CONSULTAS,
  SpecialistDomain.CUENTAS,
  SpecialistDomain.IDENTIDAD,
  SpecialistDomain.IA
];

// Classification tie-break order, highest priority first
export const ROUTING_PRIORITY: readonly SpecialistDomain[] = [
  SpecialistDomain.IDENTIDAD,
  SpecialistDomain.CUENTAS,
  SpecialistDomain.CONSULTAS,
  SpecialistDomain.IA
];

// Domain that receives queries no specialist recognises
export const DEFAULT_DOMAIN = SpecialistDomain.IA;

export const isSpecialistDomain = (value: string): value is SpecialistDomain =>
  (SPECIALIST_DOMAINS as readonly string[]).includes(value);

export interface Query {
  raw: string;
  normalized: string;
}
