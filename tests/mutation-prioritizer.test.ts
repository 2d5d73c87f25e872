import { describe, test, expect } from "vitest";
import { MutationPrioritizer, parseMutationLocation } from "@/lib/mutation-prioritizer";
import { DEFAULT_MUTATION_CLASSES, resolveMutationClasses } from "@/lib/mutation-classes";
import { ConfigurationError, InvalidParameterError } from "@/lib/join-errors";

const colon = new MutationPrioritizer(resolveMutationClasses("colon"));
const maf = new MutationPrioritizer(resolveMutationClasses("ovarian"));
const gbm = new MutationPrioritizer(resolveMutationClasses("gbm"));

describe("parseMutationLocation", () => {
  test("reads the first run of digits", () => {
    expect(parseMutationLocation("p.R273H")).toBe(273);
    expect(parseMutationLocation("c.1234_1235del")).toBe(1234);
  });

  test("no digits or no location is null", () => {
    expect(parseMutationLocation("splice")).toBeNull();
    expect(parseMutationLocation(null)).toBeNull();
  });
});

describe("resolveMutationClasses", () => {
  test("is case-insensitive and falls back to default", () => {
    expect(resolveMutationClasses("COLON")).toBe(DEFAULT_MUTATION_CLASSES.colon);
    expect(resolveMutationClasses("ovarian")).toBe(DEFAULT_MUTATION_CLASSES.default);
  });

  test("fails without a matching or default entry", () => {
    expect(() => resolveMutationClasses("ovarian", {})).toThrow(ConfigurationError);
  });
});

describe("MutationPrioritizer.choose", () => {
  test("empty filter falls back to truncating over silent", () => {
    expect(colon.choose([], ["Silent", "frameshift deletion"], ["p.5", "p.3"])).toEqual({
      mutation: "frameshift deletion",
      location: "p.3",
      unknownTypes: [],
    });
  });

  test("truncating beats missense even further along the protein", () => {
    const chosen = colon.choose([], ["nonsynonymous SNV", "stopgain"], ["p.2", "p.90"]);
    expect(chosen.mutation).toBe("stopgain");
  });

  test("a filter token matching a mutation type wins", () => {
    const chosen = colon.choose(
      ["nonsynonymous SNV"],
      ["frameshift deletion", "nonsynonymous SNV"],
      ["p.5", "p.9"],
    );
    expect(chosen).toEqual({ mutation: "nonsynonymous SNV", location: "p.9", unknownTypes: [] });
  });

  test("a filter token can match a location", () => {
    const chosen = colon.choose(["p.40"], ["stopgain", "nonsynonymous SNV"], ["p.3", "p.40"]);
    expect(chosen.location).toBe("p.40");
    expect(chosen.mutation).toBe("nonsynonymous SNV");
  });

  test("the first filter token with a match wins", () => {
    const chosen = colon.choose(
      ["stoploss", "nonsynonymous SNV", "frameshift deletion"],
      ["frameshift deletion", "nonsynonymous SNV"],
      ["p.5", "p.9"],
    );
    expect(chosen.mutation).toBe("nonsynonymous SNV");
  });

  test("a missing location is deprioritized", () => {
    expect(colon.choose([], ["stopgain", "frameshift deletion"], [null, "p.40"])).toEqual({
      mutation: "frameshift deletion",
      location: "p.40",
      unknownTypes: [],
    });
  });

  test("without any parsable location the first candidate wins", () => {
    const chosen = colon.choose([], ["stopgain", "frameshift deletion"], [null, "splice"]);
    expect(chosen.mutation).toBe("stopgain");
  });

  test("ties keep the earliest candidate", () => {
    const chosen = colon.choose([], ["stopgain", "frameshift insertion"], ["p.7", "c.7dup"]);
    expect(chosen).toEqual({ mutation: "stopgain", location: "p.7", unknownTypes: [] });
  });

  test("candidates are grouped by first occurrence of each matching type", () => {
    // stopgain (0, 2) is visited before frameshift deletion (1), so the tie at 10 goes to 2.
    const chosen = colon.choose(
      [],
      ["stopgain", "frameshift deletion", "stopgain"],
      ["p.20", "p.10", "p.10"],
    );
    expect(chosen.mutation).toBe("stopgain");
    expect(chosen.location).toBe("p.10");
  });

  test("unknown types are reported and take part at the lowest level", () => {
    expect(maf.choose([], ["Weird_Type", "Silent"], ["p.3", "p.1"])).toEqual({
      mutation: "Silent",
      location: "p.1",
      unknownTypes: ["Weird_Type"],
    });
  });

  test("noncoding types rank above silent when the class set has them", () => {
    expect(gbm.choose([], ["Silent", "Intron"], ["p.1", "c.50"])).toEqual({
      mutation: "Intron",
      location: "c.50",
      unknownTypes: [],
    });
  });

  test("is deterministic", () => {
    const args: [string[], string[], string[]] = [[], ["Missense_Mutation", "In_Frame_Del"], ["p.8", "p.8"]];
    expect(maf.choose(...args)).toEqual(maf.choose(...args));
    expect(maf.choose(...args).mutation).toBe("Missense_Mutation");
  });

  test("rejects empty or unequal lists", () => {
    expect(() => colon.choose([], [], [])).toThrow(InvalidParameterError);
    expect(() => colon.choose([], ["stopgain"], [])).toThrow(InvalidParameterError);
  });
});
