/**
 * Term Store
 * Ordered sequence of terms with a name -> position lookup
 */

import type { Term } from "../types";

export class TermStore {
  private terms: Term[] = [];
  private positions = new Map<string, number>();

  get size(): number {
    return this.terms.length;
  }

  /**
   * Append a new term for a label, disambiguating repeats
   *
   * @example
   * store.add("Fall Qtr 2025").name // "Fall Qtr 2025"
   * store.add("Fall Qtr 2025").name // "Fall Qtr 2025 (2)"
   */
  add(label: string): Term {
    let name = label;
    let suffix = 1;
    while (this.positions.has(name)) {
      suffix++;
      name = `${label} (${suffix})`;
    }

    const term: Term = { name, rawLines: [] };
    this.positions.set(name, this.terms.length);
    this.terms.push(term);
    return term;
  }

  has(name: string): boolean {
    return this.positions.has(name);
  }

  get(name: string): Term | undefined {
    const position = this.positions.get(name);
    return position === undefined ? undefined : this.terms[position];
  }

  /**
   * Terms in the order they were found (newest first in a transcript)
   */
  inEncounterOrder(): readonly Term[] {
    return this.terms;
  }

  /**
   * Terms oldest first
   */
  chronological(): Term[] {
    return [...this.terms].reverse();
  }
}
