export class StageInitializationError extends Error {
  stageName: string;

  constructor(stageName: string, message: string) {
    super(`Stage '${stageName}' could not be initialized: ${message}`);
    this.name = "StageInitializationError";
    this.stageName = stageName;
  }
}
