import { z } from 'zod';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export function flagFromCli() {
  return z
    .preprocess((value) => {
      if (value === undefined) {
        return 'false';
      }

      if (typeof value === 'string') {
        return value.toLowerCase();
      }

      return value;
    }, booleanFromCliSchema)
    .default(false);
}

export function pathFromCli(flag: string) {
  return z
    .preprocess(
      (value) => {
        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().min(1, `Invalid --${flag} path`),
    )
    .optional();
}

export function numberFromCli(schema: z.ZodNumber) {
  return z
    .preprocess((value) => {
      if (typeof value === 'string') {
        const parsedValue = Number(value);
        return Number.isFinite(parsedValue) ? parsedValue : value;
      }

      return value;
    }, schema)
    .optional();
}
