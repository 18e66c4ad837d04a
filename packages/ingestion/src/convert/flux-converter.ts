import {
  getZeroPointFlux,
  INSTRUMENTAL_ZEROPOINT,
  MISSING_VALUE_SENTINEL,
  type CanonicalObservation,
  type FluxObservation,
  type ZeroPointTable,
} from '@lcforge/core';

export function magnitudeToFlux(magnitude: number, zeroPointFlux: number): number {
  return zeroPointFlux * Math.pow(10, -0.4 * magnitude);
}

/**
 * First-order propagation of a magnitude error into flux; the sentinel when the error is missing.
 */
export function fluxErrorFromMagnitudeError(flux: number, magnitudeError: number | undefined): number {
  if (magnitudeError === undefined || !Number.isFinite(magnitudeError)) {
    return MISSING_VALUE_SENTINEL;
  }
  return flux * 0.4 * Math.LN10 * magnitudeError;
}

export interface FluxConversion {
  observations: FluxObservation[];
  /** Passbands the magnitude system has no zero point for, in first-seen order. */
  bandsWithoutZeroPoint: string[];
  droppedRows: number;
}

/**
 * Convert observations to flux with the zero points of one magnitude system.
 * Rows in a passband the system has no zero point for are dropped and reported.
 */
export function convertToFlux(
  observations: readonly CanonicalObservation[],
  magSystem: string,
  zeroPoints: ZeroPointTable
): FluxConversion {
  const zeropointSystem = magSystem.toLowerCase();
  const converted: FluxObservation[] = [];
  const missing = new Set<string>();

  for (const observation of observations) {
    const zeroPoint = getZeroPointFlux(zeroPoints, magSystem, observation.band);
    if (zeroPoint.isErr()) {
      missing.add(observation.band);
      continue;
    }

    const flux = magnitudeToFlux(observation.magnitude, zeroPoint.value);
    converted.push({
      ...observation,
      flux,
      fluxError: fluxErrorFromMagnitudeError(flux, observation.magnitudeError),
      zeropoint: INSTRUMENTAL_ZEROPOINT,
      zeropointSystem,
    });
  }

  return {
    bandsWithoutZeroPoint: [...missing],
    droppedRows: observations.length - converted.length,
    observations: converted,
  };
}
