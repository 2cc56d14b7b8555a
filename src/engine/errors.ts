/**
 * Engine errors. Only malformed input from outside the engine reaches these;
 * correct internal use never throws.
 */

export class UnknownMoveError extends Error {
  constructor(
    public readonly token: string,
    public readonly position?: number
  ) {
    super(
      position === undefined
        ? `Unknown move "${token}"`
        : `Unknown move "${token}" at offset ${position}`
    );
    this.name = 'UnknownMoveError';
  }
}

export class FaceletAddressError extends Error {
  constructor(
    public readonly face: unknown,
    public readonly row: unknown,
    public readonly col: unknown
  ) {
    super(`Invalid facelet query: face=${String(face)} row=${String(row)} col=${String(col)}`);
    this.name = 'FaceletAddressError';
  }
}

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

export class ScrambleLengthError extends Error {
  constructor(public readonly length: number) {
    super(`Scramble length must be a non-negative integer, got ${length}`);
    this.name = 'ScrambleLengthError';
  }
}

export class StateDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateDecodeError';
  }
}

export class MoveTableError extends Error {
  constructor(public readonly failures: readonly string[]) {
    super(`Move tables failed validation:\n  ${failures.join('\n  ')}`);
    this.name = 'MoveTableError';
  }
}
