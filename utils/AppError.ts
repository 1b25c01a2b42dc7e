// utils/AppError.ts

/**
 * Base class for expected (operational) failures.
 * The error middleware maps these to their status code; anything else is a 500.
 */
class AppError extends Error {
    public readonly statusCode: number;
    public readonly status: 'fail' | 'error';
    public readonly isOperational = true;

    constructor(message: string, statusCode: number = 500) {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.status = statusCode >= 400 && statusCode < 500 ? 'fail' : 'error';
        Error.captureStackTrace?.(this, new.target);
    }
}

export default AppError;
