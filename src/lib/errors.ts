/** Base of every error raised by this library. */
export class PacketError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A structurally invalid binary record, eg. a block whose two length fields disagree. */
export class FormatError extends PacketError { }

/** Input ended before a field or record was complete. */
export class ParseError extends PacketError {
    constructor(message: string, public needed?: number, public available?: number) {
        super(needed === undefined ? message : `${message} (needed ${needed} bytes, ${available ?? 0} available)`);
    }
}

/**
 * No binding, an ambiguous binding or a binding whose discriminator does not match.
 * `hint` carries the `bind` call that would have made the composition legal.
 */
export class BindingError extends PacketError {
    constructor(message: string, public from?: string, public to?: string, public hint?: string) {
        super(hint ? `${message}; ${hint}` : message);
    }
}

/** Failure reported by the capture/inject collaborator. */
export class WireError extends PacketError { }

/** Malformed human readable input. */
export class ArgumentError extends PacketError { }

export class StructValueError extends PacketError {
    constructor(message: string, public value: unknown) {
        super(`cannot set; ${message}`);
    }
}

export class CreateStructTypeError extends PacketError {
    constructor(public f: Function, cause: string) {
        super(`operation failed for ${f.name}. Cause; ${cause}`);
        this.cause = cause;
    }
}
