import { z } from 'zod';
import { decode } from './decode';

export const NetworkJsonSchema = z.object({
  name: z.string().default(''),
  id: z.string().default(''),
  driver: z.string().default(''),
  scope: z.string().default(''),
});

export type NetworkJson = z.output<typeof NetworkJsonSchema>;

/**
 * A network as reported by a listing.
 */
export class Network {
  readonly name: string;
  readonly id: string;
  readonly driver: string;
  readonly scope: string;

  constructor(init: Partial<NetworkJson> = {}) {
    this.name = init.name ?? '';
    this.id = init.id ?? '';
    this.driver = init.driver ?? '';
    this.scope = init.scope ?? '';
    Object.freeze(this);
  }

  static fromJson(json: unknown): Network {
    return new Network(decode(NetworkJsonSchema, json, 'network'));
  }

  toJson(): NetworkJson {
    return { name: this.name, id: this.id, driver: this.driver, scope: this.scope };
  }

  with(changes: Partial<NetworkJson>): Network {
    return new Network({ ...this.toJson(), ...changes });
  }

  equals(other: Network): boolean {
    return (
      this === other ||
      (other.name === this.name &&
        other.id === this.id &&
        other.driver === this.driver &&
        other.scope === this.scope)
    );
  }

  toString(): string {
    return `Network(name: ${this.name}, id: ${this.id}, driver: ${this.driver}, scope: ${this.scope})`;
  }
}
