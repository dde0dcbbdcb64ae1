import { Collision } from './types';

export class DotlinksError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Problems in the mapping table or its inputs. Always fatal. */
export class ConfigurationError extends DotlinksError {}

export class CollisionError extends ConfigurationError {
  readonly collisions: Collision[];

  constructor(collisions: Collision[]) {
    const lines = collisions.map(
      (collision) => `  ${collision.target} is targeted by: ${collision.names.join(', ')}`
    );
    super(`Found duplicate target paths:\n${lines.join('\n')}`);
    this.collisions = collisions;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error';
}
