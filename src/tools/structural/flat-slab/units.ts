/**
 * Unit conversion constants for the flat slab engine.
 *
 * Inputs arrive in the customary Thai/metric engineering units (cm, m, ksc,
 * kg/m²); the engine works in SI (m, Pa, N). The config is frozen and passed
 * explicitly into the geometry preparer.
 */

export interface UnitsConfig {
  /** Standard gravity (m/s²), also the kg → N factor */
  readonly g: number;
  readonly m_per_cm: number;
  readonly pa_per_ksc: number;
  readonly mpa_per_ksc: number;
  /** Unit mass of reinforced concrete (kg/m³) */
  readonly concrete_density_kgm3: number;
}

export const DEFAULT_UNITS: UnitsConfig = Object.freeze({
  g: 9.80665,
  m_per_cm: 0.01,
  pa_per_ksc: 98066.5,
  mpa_per_ksc: 0.0980665,
  concrete_density_kgm3: 2400,
});

export const PA_PER_MPA = 1e6;
export const CM2_PER_M2 = 1e4;

export function mpaToPa(value_mpa: number): number {
  return value_mpa * PA_PER_MPA;
}

export function paToMpa(value_pa: number): number {
  return value_pa / PA_PER_MPA;
}

/** Ec = 4700·√fc' (MPa), ACI 318 19.2.2.1 for normal-weight concrete. */
export function concreteModulusMpa(fc_mpa: number): number {
  return 4700 * Math.sqrt(fc_mpa);
}
