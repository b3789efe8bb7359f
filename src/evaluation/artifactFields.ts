export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Truthiness as the artifact format means it: empty strings, lists and objects count as absent. */
export const isPresent = (value: unknown): boolean => {
  if (value === undefined || value === null || value === false || value === 0 || value === "") return false;
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
};

export const readList = (source: unknown, key: string): unknown[] => {
  if (!isRecord(source)) return [];
  const value = source[key];
  return Array.isArray(value) ? value : [];
};

export const readRecords = (source: unknown, key: string): Record<string, unknown>[] =>
  readList(source, key).filter(isRecord);

export const readText = (source: Record<string, unknown>, key: string): string => {
  const value = source[key];
  return typeof value === "string" ? value : "";
};

export const readStrings = (source: Record<string, unknown>, key: string): string[] =>
  readList(source, key).filter((item): item is string => typeof item === "string");

export const testCaseLabel = (testCase: Record<string, unknown>): string => {
  const id = testCase.id;
  if (typeof id === "string" || typeof id === "number") return String(id);
  return "unknown";
};

export const readScenarioIds = (plannerOutput: unknown): string[] => {
  const ids: string[] = [];
  for (const scenario of readRecords(plannerOutput, "scenarios")) {
    const id = scenario.scenario_id;
    if (typeof id === "string" && id.length > 0 && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
};

export interface StepKinds {
  given: boolean;
  when: boolean;
  then: boolean;
}

export const readStepKinds = (testCase: Record<string, unknown>): StepKinds => {
  const steps = readStrings(testCase, "steps").map((step) => step.trim().toLowerCase());
  return {
    given: steps.some((step) => step.startsWith("given")),
    when: steps.some((step) => step.startsWith("when")),
    then: steps.some((step) => step.startsWith("then"))
  };
};

export const hasExpectedResult = (testCase: Record<string, unknown>): boolean => isPresent(testCase.expected_result);

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
};
