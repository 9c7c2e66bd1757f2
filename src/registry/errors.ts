export type RegistryErrorKind =
  | 'InvalidInput'
  | 'NotFound'
  | 'AlreadyExists'
  | 'Forbidden'
  | 'IndexOutOfRange';

/**
 * Domain failure raised by the registry. Any RegistryError aborts the
 * whole operation before anything is committed.
 */
export class RegistryError extends Error {
  readonly kind: RegistryErrorKind;

  constructor(kind: RegistryErrorKind, message: string) {
    super(message);
    this.name = 'RegistryError';
    this.kind = kind;
  }
}

export function isRegistryError(value: unknown): value is RegistryError {
  return value instanceof RegistryError;
}

export const invalidInput = (message: string) => new RegistryError('InvalidInput', message);
export const notFound = (message: string) => new RegistryError('NotFound', message);
export const alreadyExists = (message: string) => new RegistryError('AlreadyExists', message);
export const forbidden = (message: string) => new RegistryError('Forbidden', message);
export const indexOutOfRange = (message: string) => new RegistryError('IndexOutOfRange', message);
