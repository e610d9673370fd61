import { toKebabCase } from "../parser/text-sections.js";

/**
 * Hands out unique ids: the requested base when free, otherwise
 * `base-2`, `base-3`, …
 */
export class IdAllocator {
  private readonly taken = new Set<string>();

  constructor(reserved: Iterable<string> = []) {
    for (const id of reserved) this.taken.add(id);
  }

  has(id: string): boolean {
    return this.taken.has(id);
  }

  reserve(id: string): void {
    this.taken.add(id);
  }

  release(id: string): void {
    this.taken.delete(id);
  }

  allocate(base: string): string {
    let id = base;
    let n = 2;
    while (this.taken.has(id)) {
      id = `${base}-${n}`;
      n += 1;
    }
    this.taken.add(id);
    return id;
  }
}

export function stepNodeBase(featureId: string, order: number, stepType: string): string {
  return toKebabCase(`${featureId}-${order}-${stepType}`);
}

export function exitBase(sourceId: string, targetId: string): string {
  return `exit-${sourceId}-to-${targetId}`;
}
