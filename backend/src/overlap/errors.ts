/**
 * A discard answer that does not name a member of the cluster being resolved
 */
export class InvalidSelectionError extends Error {
  constructor(
    public readonly selection: number,
    public readonly members: readonly number[]
  ) {
    super(`Line ${selection} is not part of the current overlap (choose one of ${members.join(', ')})`);
    this.name = 'InvalidSelectionError';
  }
}

/**
 * The interactive session ended before every overlap was resolved
 */
export class AbortedResolutionError extends Error {
  constructor(
    public readonly clusterNumber: number,
    public readonly clusterCount: number,
    options?: { cause?: unknown }
  ) {
    super(`Overlap resolution aborted at cluster ${clusterNumber} of ${clusterCount}`, options);
    this.name = 'AbortedResolutionError';
  }
}
