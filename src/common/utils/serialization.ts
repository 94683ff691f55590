import { ClassConstructor, instanceToPlain, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { ApiResponseError, InvalidArgumentError } from '../errors/ledger.errors';
import { FilterValue, isFilterValue, isRecord } from './filters';

const MAPPING_OPTIONS = { excludeExtraneousValues: true };

/**
 * Maps `{ "<root>": { ... } }` to a model instance.
 */
export function toRecord<T extends object>(
  model: ClassConstructor<T>,
  body: unknown,
  root: string,
): T {
  const record = isRecord(body) ? body[root] : undefined;
  if (!isRecord(record)) {
    throw new ApiResponseError(`Response has no "${root}" object`);
  }
  return plainToInstance(model, record, MAPPING_OPTIONS);
}

/**
 * Maps `{ "<root>": [ ... ] }` to model instances.
 */
export function toRecords<T extends object>(
  model: ClassConstructor<T>,
  body: unknown,
  root: string,
): T[] {
  const items = isRecord(body) ? body[root] : undefined;
  if (!Array.isArray(items)) {
    throw new ApiResponseError(`Response has no "${root}" array`);
  }
  return items.map((item: unknown) => {
    if (!isRecord(item)) {
      throw new ApiResponseError(`"${root}" contains a non-object entry`);
    }
    return plainToInstance(model, item, MAPPING_OPTIONS);
  });
}

function toPlain<T extends object>(model: ClassConstructor<T>, input: Partial<T>): Record<string, unknown> {
  return instanceToPlain(Object.assign(new model(), input), { exposeUnsetFields: false });
}

export function toPayload<T extends object>(
  model: ClassConstructor<T>,
  input: Partial<T>,
  root: string,
): Record<string, unknown> {
  return { [root]: toPlain(model, input) };
}

export function toPayloadList<T extends object>(
  model: ClassConstructor<T>,
  inputs: readonly Partial<T>[],
  root: string,
): Record<string, unknown> {
  return { [root]: inputs.map((input) => toPlain(model, input)) };
}

function describeErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => Object.values(error.constraints ?? {}).join(', '))
    .join('; ');
}

/**
 * Validates a filter DTO and renders it with its wire names.
 *
 * @throws InvalidArgumentError when a filter fails validation
 */
export function toQuery<T extends object>(
  model: ClassConstructor<T>,
  filters: T,
): Record<string, FilterValue> {
  const instance = Object.assign(new model(), filters);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    throw new InvalidArgumentError(`Invalid filters: ${describeErrors(errors)}`);
  }

  const query: Record<string, FilterValue> = {};
  for (const [name, value] of Object.entries(instanceToPlain(instance, { exposeUnsetFields: false }))) {
    if (isFilterValue(value)) {
      query[name] = value;
    }
  }
  return query;
}
