import { ValidationError } from "./bases/validation-error.js";

/**
 * Thrown for unknown flags or a flag missing its value.
 */
export class UsageError extends ValidationError<"CLI_USAGE_INVALID"> {
  constructor(message: string) {
    super({ code: "CLI_USAGE_INVALID", message });
  }
}
