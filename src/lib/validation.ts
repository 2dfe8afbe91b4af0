import { z } from 'zod';
import { MINIMUM_DONATION } from '../config';
import { CATEGORY_OPTIONS, type RegistrationInput } from '../types';

export interface RegistrationFormValues {
  name: string;
  email: string;
  category: string;
  amount: number;
}

export type ValidationResult =
  | { ok: true; registration: RegistrationInput }
  | { ok: false; errors: string[] };

const registrationFormSchema = z.object({
  name: z
    .string()
    .min(2, 'Name must be at least 2 characters long')
    .max(50, 'Name must be less than 50 characters'),
  email: z.string().refine((value) => value.includes('@'), 'Please enter a valid email address'),
  category: z.enum(CATEGORY_OPTIONS, {
    errorMap: () => ({ message: `Category must be one of: ${CATEGORY_OPTIONS.join(', ')}` }),
  }),
  amount: z
    .number({ invalid_type_error: 'Pledge amount must be a number' })
    .finite('Pledge amount must be a number')
    .min(MINIMUM_DONATION, `Minimum donation is $${MINIMUM_DONATION}`),
});

export function validateRegistration(values: RegistrationFormValues): ValidationResult {
  const parsed = registrationFormSchema.safeParse(values);

  if (!parsed.success) {
    return { ok: false, errors: parsed.error.issues.map((issue) => issue.message) };
  }

  return { ok: true, registration: parsed.data };
}
