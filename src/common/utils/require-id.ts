import { InvalidArgumentError } from '../errors/ledger.errors';

export function requireId(id: string, label = 'id'): string {
  if (typeof id !== 'string' || id.trim() === '') {
    throw new InvalidArgumentError(`${label} must be a non-empty string`);
  }
  return id.trim();
}
