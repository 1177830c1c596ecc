import { z } from 'zod';
import { decode, recordsEqual } from './decode';

export const ContainerJsonSchema = z.object({
  name: z.string().default(''),
  id: z.string().default(''),
  status: z.string().default(''),
  labels: z.record(z.string(), z.string()).default({}),
});

export type ContainerJson = z.output<typeof ContainerJsonSchema>;

/**
 * A container as reported by a listing. Immutable; compare with `equals`.
 */
export class Container {
  readonly name: string;
  readonly id: string;
  readonly status: string;
  readonly labels: Readonly<Record<string, string>>;

  constructor(init: Partial<ContainerJson> = {}) {
    this.name = init.name ?? '';
    this.id = init.id ?? '';
    this.status = init.status ?? '';
    this.labels = Object.freeze({ ...(init.labels ?? {}) });
    Object.freeze(this);
  }

  static fromJson(json: unknown): Container {
    return new Container(decode(ContainerJsonSchema, json, 'container'));
  }

  toJson(): ContainerJson {
    return {
      name: this.name,
      id: this.id,
      status: this.status,
      labels: { ...this.labels },
    };
  }

  /**
   * Copy with the given fields replaced.
   */
  with(changes: Partial<ContainerJson>): Container {
    return new Container({ ...this.toJson(), ...changes });
  }

  equals(other: Container): boolean {
    return (
      this === other ||
      (other.name === this.name &&
        other.id === this.id &&
        other.status === this.status &&
        recordsEqual(other.labels, this.labels))
    );
  }

  toString(): string {
    return `Container(name: ${this.name}, id: ${this.id}, status: ${this.status}, labels: ${JSON.stringify(this.labels)})`;
  }
}
