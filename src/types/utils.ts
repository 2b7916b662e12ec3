// Utility types shared across the organizer

// Generic result type for operations that can succeed or fail
export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

// Async result type
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;
