import { ValueTransformer } from 'typeorm';

/** MySQL hands DECIMAL columns back as strings. */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
