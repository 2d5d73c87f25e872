/**
 * Mutation prioritization — picks one (mutation, location) pair from the
 * several calls a sample can have for one gene.
 *
 * Order of preference:
 *   1. the first filter token matching a mutation type (else a location)
 *   2. truncating mutations
 *   3. missense mutations
 *   4. noncoding mutations, when the class set defines them
 *   5. everything else, treated as silent
 * Within the winning candidates the earliest position in the sequence wins.
 */

import { InvalidParameterError } from "@/lib/join-errors";
import type { MutationClassSet } from "@/lib/mutation-classes";

export interface ChosenMutation {
  mutation: string;
  location: string | null;
  /** Mutation types outside every known class, reached at the silent step. */
  unknownTypes: string[];
}

/**
 * Numeric position of a location string: the integer formed by the first
 * run of decimal digits. "p.R273H" → 273, "c.1234_1235del" → 1234.
 * Returns null for null or digit-free strings.
 */
export function parseMutationLocation(location: string | null): number | null {
  if (location === null) return null;
  const m = location.match(/[0-9]+/);
  return m ? parseInt(m[0], 10) : null;
}

/** Indices whose mutation is in `labels`, grouped by first occurrence of each value. */
function classIndices(mutations: readonly string[], labels: readonly string[]): number[] {
  const chosen: number[] = [];
  for (const mutation of mutations) {
    if (!labels.includes(mutation)) continue;
    mutations.forEach((value, i) => {
      if (value === mutation && !chosen.includes(i)) chosen.push(i);
    });
  }
  return chosen;
}

export class MutationPrioritizer {
  constructor(private readonly classes: MutationClassSet) {}

  choose(
    filter: readonly string[],
    mutations: readonly string[],
    locations: readonly (string | null)[],
  ): ChosenMutation {
    if (mutations.length === 0) {
      throw new InvalidParameterError("Cannot choose a mutation from an empty list.");
    }
    if (mutations.length !== locations.length) {
      throw new InvalidParameterError(
        `Got ${mutations.length} mutations but ${locations.length} locations; the lists must be parallel.`,
      );
    }

    let unknownTypes: string[] = [];
    let chosen = this.filterCandidates(filter, mutations, locations);

    if (chosen.length === 0) chosen = classIndices(mutations, this.classes.truncating);
    if (chosen.length === 0) chosen = classIndices(mutations, this.classes.missense);
    if (chosen.length === 0 && this.classes.noncoding) {
      chosen = classIndices(mutations, this.classes.noncoding);
    }
    if (chosen.length === 0) {
      unknownTypes = [...new Set(mutations.filter((m) => !this.classes.silent.includes(m)))];
      chosen = mutations.map((_, i) => i);
    }

    const best = this.soonest(chosen, locations);
    return { mutation: mutations[best], location: locations[best], unknownTypes };
  }

  private filterCandidates(
    filter: readonly string[],
    mutations: readonly string[],
    locations: readonly (string | null)[],
  ): number[] {
    for (const token of filter) {
      let chosen: number[] = [];
      if (mutations.includes(token)) {
        chosen = mutations.flatMap((value, i) => (value === token ? [i] : []));
      } else if (locations.includes(token)) {
        chosen = locations.flatMap((value, i) => (value === token ? [i] : []));
      }
      if (chosen.length > 0) return chosen;
    }
    return [];
  }

  /** Candidate with the smallest parsed location; missing locations lose, ties keep the first. */
  private soonest(candidates: readonly number[], locations: readonly (string | null)[]): number {
    let best = candidates[0];
    let bestPos = parseMutationLocation(locations[best]);
    for (const i of candidates) {
      const pos = parseMutationLocation(locations[i]);
      if (pos === null) continue;
      if (bestPos === null || pos < bestPos) {
        best = i;
        bestPos = pos;
      }
    }
    return best;
  }
}
