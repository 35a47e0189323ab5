import { Request } from 'express';
import { z } from 'zod';

export type FormMethod = 'POST' | 'PUT' | 'DELETE';

export type FormErrors = Record<string, string[]>;

export interface FormView {
  method: FormMethod;
  action: string;
  values: Record<string, unknown>;
  errors: FormErrors;
}

export interface BoundForm<T> {
  submitted: boolean;
  valid: boolean;
  data: T | null;
  view: FormView;
}

export type FormRequest = Pick<Request, 'method' | 'body'>;

export interface FormOptions {
  method: FormMethod;
  action: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const collectErrors = (error: z.ZodError): FormErrors => {
  const errors: FormErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.map(String).join('.') : '_form';
    errors[field] = [...(errors[field] ?? []), issue.message];
  }
  return errors;
};

/**
 * Bind the request body to a schema. The form counts as submitted only when the
 * request uses the form's own method; otherwise the initial values are shown.
 * A submitted form binds the body alone, so a missing field is empty.
 */
export const bindForm = <S extends z.ZodTypeAny>(
  req: FormRequest,
  schema: S,
  options: FormOptions,
  initial: Record<string, unknown> = {}
): BoundForm<z.infer<S>> => {
  const submitted = req.method === options.method;

  if (!submitted) {
    return {
      submitted,
      valid: false,
      data: null,
      view: { ...options, values: initial, errors: {} }
    };
  }

  const body: unknown = req.body;
  const values = isRecord(body) ? body : {};
  const result = schema.safeParse(values);

  return {
    submitted,
    valid: result.success,
    data: result.success ? result.data : null,
    view: {
      ...options,
      values,
      errors: result.success ? {} : collectErrors(result.error)
    }
  };
};

/**
 * Mark a bound form invalid with an extra error, e.g. after a lookup
 */
export const addFormError = <T>(form: BoundForm<T>, field: string, message: string): BoundForm<T> => ({
  ...form,
  valid: false,
  data: null,
  view: {
    ...form.view,
    errors: { ...form.view.errors, [field]: [...(form.view.errors[field] ?? []), message] }
  }
});
