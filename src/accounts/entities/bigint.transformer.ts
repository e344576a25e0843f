import { ValueTransformer } from 'typeorm';

/**
 * Postgres returns BIGINT as a string; Telegram ids fit in a JS number.
 */
export const bigintTransformer: ValueTransformer = {
  to: (value: number | undefined | null) => value,
  from: (value: string | null) => (value === null ? null : Number(value)),
};
