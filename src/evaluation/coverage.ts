import { readStrings, readText } from "./artifactFields";

export interface ScenarioCoverage {
  covered: string[];
  missing: string[];
}

export const testCaseSearchText = (testCase: Record<string, unknown>): string =>
  `${readText(testCase, "title")} ${readStrings(testCase, "steps").join(" ")}`.toLowerCase();

// Plain substring match: "SC-1" also matches inside "SC-10".
export const referencesScenario = (searchText: string, scenarioId: string): boolean => {
  const id = scenarioId.toLowerCase();
  return searchText.includes(id) || searchText.includes(`scenario ${id}`);
};

export const referencesAnyScenario = (testCase: Record<string, unknown>, scenarioIds: string[]): boolean => {
  const text = testCaseSearchText(testCase);
  return scenarioIds.some((id) => referencesScenario(text, id));
};

export const computeScenarioCoverage = (
  scenarioIds: string[],
  testCases: Record<string, unknown>[]
): ScenarioCoverage => {
  const texts = testCases.map(testCaseSearchText);
  const covered = scenarioIds.filter((id) => texts.some((text) => referencesScenario(text, id)));
  return {
    covered,
    missing: scenarioIds.filter((id) => !covered.includes(id))
  };
};
