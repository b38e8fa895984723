import { IntegrityFault } from "../outcome/errors";

/**
 * A slot filled exactly once after its owner is constructed.
 * A second write, or a read before the first, is an integrity fault.
 */
export class WriteOnce<T> {
  private value: T | undefined;
  private filled = false;

  constructor(private readonly label: string) {}

  set(value: T): void {
    if (this.filled) {
      throw new IntegrityFault("write-once slot assigned twice", {
        entity: this.label,
        expected: "unassigned",
        found: "assigned",
      });
    }
    this.value = value;
    this.filled = true;
  }

  get(): T {
    if (!this.filled || this.value === undefined) {
      throw new IntegrityFault("write-once slot read before assignment", {
        entity: this.label,
        expected: "assigned",
        found: "unassigned",
      });
    }
    return this.value;
  }

  peek(): T | undefined {
    return this.value;
  }

  isSet(): boolean {
    return this.filled;
  }
}
