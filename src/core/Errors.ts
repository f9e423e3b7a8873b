// Errors.ts - Error types raised by matrix validation and solving

export class InvalidMatrixError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidMatrixError';
    }
}

export class SingularMatrixError extends Error {
    constructor(message = 'Matrix is singular and cannot be inverted') {
        super(message);
        this.name = 'SingularMatrixError';
    }
}
