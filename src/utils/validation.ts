import type { ZodError } from 'zod';

export interface FieldError {
  path: string;
  message: string;
}

/** Flatten zod issues into `{path, message}` pairs, e.g. `message.chat_id`. */
export function fieldErrors(error: ZodError): FieldError[] {
  return error.issues.map(issue => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
