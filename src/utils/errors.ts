/**
 * Base class for every error the application raises on purpose.
 * `statusCode` is what the HTTP layer answers with.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class ProfileNotFoundError extends AppError {
  readonly profilePath: string;

  constructor(profilePath: string) {
    super(
      `No profile found at ${profilePath}. Create one first with ` +
        "`npm run profile:prepare -- <resume.pdf>` or `POST /profile/upload`.",
      404,
    );
    this.profilePath = profilePath;
  }
}

export class ProfileFormatError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(
      issues.length > 0 ? `${message}: ${issues.join("; ")}` : message,
      422,
      options,
    );
    this.issues = issues;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class CompletionError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 502, options);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}
