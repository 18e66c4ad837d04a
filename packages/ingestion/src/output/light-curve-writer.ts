import type { FluxObservation, ObjectMetadata } from '@lcforge/core';
import type { Result } from 'neverthrow';

export interface LightCurveRecord {
  readonly objectId: string;
  readonly survey: string;
  readonly metadata: ObjectMetadata;
  readonly observations: readonly FluxObservation[];
}

export interface LightCurveWriter {
  /** Persist one object's light curve; resolves to where it was written. */
  write(record: LightCurveRecord): Promise<Result<string, Error>>;
}
