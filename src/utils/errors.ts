// Errors carrying an HTTP status; the app's error handler renders them as { error: message }.
export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCredentialsError extends HttpError {
  constructor() {
    super(401, "Invalid email or password");
  }
}

export class UserInactiveError extends HttpError {
  constructor() {
    super(403, "User account is inactive");
  }
}

export class UserNotFoundError extends HttpError {
  constructor(userId: string) {
    super(404, `User with ID ${userId} not found`);
  }
}

export class UserAlreadyExistsError extends HttpError {
  constructor(email: string) {
    super(409, `User with email ${email} already exists`);
  }
}

export class TokenInvalidError extends HttpError {
  constructor() {
    super(401, "Invalid or expired token");
  }
}

// Kept apart from TokenInvalidError: clients answer this one with a full re-login.
export class InvalidRefreshTokenError extends HttpError {
  constructor() {
    super(401, "Invalid or expired refresh token");
  }
}

export class DatabaseError extends HttpError {
  constructor(cause?: unknown) {
    super(500, "Database error");
    this.cause = cause;
  }
}
