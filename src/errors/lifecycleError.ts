export type LifecycleErrorCode =
    | 'IllegalStateTransition'
    | 'IllegalTiming'
    | 'InvalidMagnitude'
    | 'InsufficientPayment'
    | 'UnableToUpdate'
    | 'NotFound'
    | 'Unauthorized';

export const HTTP_STATUS_BY_CODE: Record<LifecycleErrorCode, number> = {
    IllegalStateTransition: 409,
    IllegalTiming: 422,
    InvalidMagnitude: 400,
    InsufficientPayment: 402,
    UnableToUpdate: 409,
    NotFound: 404,
    Unauthorized: 403,
};

/**
 * Every rejected lifecycle operation surfaces as one of these.
 * `reason` narrows the code where one code covers several checks
 * (e.g. `UndefinedFee` and `ExceedsMaxBPS` are both `InvalidMagnitude`).
 */
export class LifecycleError extends Error {
    constructor(
        public readonly code: LifecycleErrorCode,
        message: string,
        public readonly reason?: string
    ) {
        super(message);
        this.name = 'LifecycleError';
    }

    get statusCode(): number {
        return HTTP_STATUS_BY_CODE[this.code];
    }
}

export const isLifecycleError = (err: unknown): err is LifecycleError =>
    err instanceof LifecycleError;
