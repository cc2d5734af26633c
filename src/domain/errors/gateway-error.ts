/**
 * Error vocabulary shared by the gateway ports and the hierarchy engine.
 *
 *   NotFound          : the referenced directory entity is absent.
 *   AlreadyExists     : success on idempotent paths, a conflict on explicit creation.
 *   PartialFailure    : a batch where some items failed (only produced by the engine).
 *   InvalidName       : a franchise or division name that would make team names ambiguous.
 *   GatewayUnavailable: transport failure from the directory or folder service.
 */
export type ErrorKind = 'NotFound' | 'AlreadyExists' | 'PartialFailure' | 'InvalidName' | 'GatewayUnavailable';

/** Kinds a gateway adapter may raise; the others belong to the engine. */
export type GatewayErrorKind = Exclude<ErrorKind, 'PartialFailure' | 'InvalidName'>;

export class GatewayError extends Error {
  constructor(
    readonly kind: GatewayErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  static notFound(what: string): GatewayError {
    return new GatewayError('NotFound', `${what} not found`);
  }

  static alreadyExists(what: string): GatewayError {
    return new GatewayError('AlreadyExists', `${what} already exists`);
  }

  static unavailable(service: string, cause?: string): GatewayError {
    return new GatewayError('GatewayUnavailable', cause ? `${service} unavailable: ${cause}` : `${service} unavailable`);
  }
}

export function isGatewayError(error: unknown, kind?: GatewayErrorKind): error is GatewayError {
  if (!(error instanceof GatewayError)) return false;
  return kind === undefined || error.kind === kind;
}

/**
 * Classify anything a gateway threw. Values that are not a GatewayError
 * are treated as transport failures.
 */
export function classifyError(error: unknown): { kind: GatewayErrorKind; message: string } {
  if (error instanceof GatewayError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'GatewayUnavailable', message: error.message };
  }
  return { kind: 'GatewayUnavailable', message: String(error) };
}
