export class InvalidMixInputError extends Error {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number) {
    super(`Invalid mix input "${field}": expected a finite number, got ${value}`);
    this.name = 'InvalidMixInputError';
    this.field = field;
    this.value = value;
  }
}

export const assertFinite = (values: Record<string, number>) => {
  for (const [field, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) throw new InvalidMixInputError(field, value);
  }
};
