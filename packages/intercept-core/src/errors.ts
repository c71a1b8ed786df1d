export class TrackLookupError extends Error {
  public readonly trackId: number;

  constructor(trackId: number) {
    super(`track not found: ${trackId}`);
    this.name = "TrackLookupError";
    this.trackId = trackId;
  }
}
