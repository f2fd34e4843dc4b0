/**
 * Thrown when a solution handed to the search does not split the cities
 * into two disjoint tours covering every city exactly once.
 */
export class InvalidSolutionError extends Error {
  constructor(
    public readonly detail: string,
    public readonly cities: readonly number[] = [],
  ) {
    super(`Invalid solution: ${detail}`);
    this.name = 'InvalidSolutionError';
  }
}

/**
 * Thrown when an instance or distance table cannot be searched.
 */
export class InvalidInstanceError extends Error {
  constructor(
    public readonly detail: string,
    public readonly source?: string,
  ) {
    super(source ? `Invalid instance ${source}: ${detail}` : `Invalid instance: ${detail}`);
    this.name = 'InvalidInstanceError';
  }
}
