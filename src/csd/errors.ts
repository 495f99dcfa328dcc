export type CsdErrorKind = 'InvalidArgument' | 'Format';

export class CsdError extends Error {
    constructor(message: string, public readonly kind: CsdErrorKind) {
        super(message);
        this.name = 'CsdError';
    }
}

export class InvalidArgumentError extends CsdError {
    constructor(message: string) {
        super(message, 'InvalidArgument');
        this.name = 'InvalidArgumentError';
    }
}

export class FormatError extends CsdError {
    constructor(message: string) {
        super(message, 'Format');
        this.name = 'FormatError';
    }
}
