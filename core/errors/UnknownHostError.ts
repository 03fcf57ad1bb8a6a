import { PipewrightError, ErrorSeverity } from './PipewrightError';

export class UnknownHostError extends PipewrightError {
  public readonly hostName: string;

  constructor(hostName: string, knownSystems: string[] = []) {
    const known = knownSystems.length > 0 ? knownSystems.join(', ') : 'none';
    super(`System "${hostName}" is not defined in systems (known: ${known}).`, {
      code: 'UNKNOWN_HOST',
      severity: ErrorSeverity.Fatal,
      details: { hostName, knownSystems }
    });
    this.hostName = hostName;
  }
}
