import type { LineNumber } from "../types.js";
import type { OccurrenceList } from "../occurrenceList.js";

export class ArrayOccurrenceList implements OccurrenceList {
  private readonly lines: LineNumber[] = [];

  get size(): number {
    return this.lines.length;
  }

  append(line: LineNumber): void {
    this.lines.push(line);
  }

  contains(line: LineNumber): boolean {
    // linear scan; lists stay short for natural text
    return this.lines.includes(line);
  }

  toArray(): LineNumber[] {
    return Array.from(this.lines);
  }
}
