export type AppErrorStatus = 400 | 401 | 403 | 404;

/**
 * Failure that ends a single request with a known status. Routes let these
 * propagate and the app-level `onError` hook turns them into `{ error }` bodies.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly status: AppErrorStatus
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message, 400);
  }
}

export class DuplicateUserError extends AppError {
  constructor(message = "Username exists") {
    super(message, 400);
  }
}

export class InvalidParentError extends AppError {
  constructor(message = "parent_username not found or not a parent") {
    super(message, 400);
  }
}

// One message for unknown users and wrong passwords alike.
export class InvalidCredentialsError extends AppError {
  constructor() {
    super("Invalid credentials", 401);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super(message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Not allowed") {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not Found") {
    super(message, 404);
  }
}
