import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { PersonaId, ScamType } from '@decoy-agent/shared/types';
import { PERSONA_CANDIDATES } from './persona-registry';

/**
 * Injection token for the random source used to pick personas.
 * Bind a `() => number` returning values in [0, 1) to make picks repeatable.
 */
export const RANDOM_SOURCE = 'RANDOM_SOURCE';

export type RandomSource = () => number;

@Injectable()
export class PersonaSelectorService {
  private readonly logger = new Logger(PersonaSelectorService.name);
  private readonly random: RandomSource;

  constructor(@Optional() @Inject(RANDOM_SOURCE) random?: RandomSource) {
    this.random = random ?? Math.random;
  }

  candidates(scamType: ScamType): readonly PersonaId[] {
    return PERSONA_CANDIDATES[scamType];
  }

  isCandidate(scamType: ScamType, persona: PersonaId): boolean {
    return this.candidates(scamType).includes(persona);
  }

  /**
   * Pick the persona to lock for a session detected as `scamType`.
   * A `preferred` persona that already fits the category is kept, so the
   * voice used before detection carries on.
   */
  select(scamType: ScamType, preferred?: PersonaId | null): PersonaId {
    if (preferred && this.isCandidate(scamType, preferred)) {
      return preferred;
    }

    const pool = this.candidates(scamType);
    const index = Math.min(pool.length - 1, Math.floor(this.random() * pool.length));
    const persona = pool[index];
    this.logger.debug(`Selected persona ${persona} for ${scamType}`);
    return persona;
  }
}
