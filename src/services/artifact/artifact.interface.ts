export interface IArtifactService {
  /** Throws InvalidDirectoryError or EmptyArtifactError. */
  validate(directory: string): void;
  /** Zips every regular file under `directory`; returns the artifact path. */
  pack(directory: string): string;
  remove(artifactPath: string): void;
}
