import type { ConsistencyReport } from "../types";
import {
  hasExpectedResult,
  isPresent,
  isRecord,
  readRecords,
  readScenarioIds,
  readStepKinds,
  roundTo,
  testCaseLabel
} from "./artifactFields";
import { computeScenarioCoverage, referencesAnyScenario } from "./coverage";

export const consistencyDeductions = {
  uncoveredScenarios: 20,
  qualityIssue: 5,
  consistencyIssue: 3,
  structureIssue: 10
} as const;

const maxScore = 100;

export class ConsistencyEvaluator {
  evaluate(plannerOutput: unknown, testcaseOutput: unknown): ConsistencyReport {
    const issues: string[] = [];
    let deductions = 0;

    const scenarioIds = readScenarioIds(plannerOutput);
    const testCases = readRecords(testcaseOutput, "test_cases");

    const coverage = computeScenarioCoverage(scenarioIds, testCases);
    if (coverage.missing.length > 0) {
      deductions += consistencyDeductions.uncoveredScenarios;
      issues.push(`Missing test cases for scenarios: ${coverage.missing.join(", ")}`);
    }

    deductions += this.checkTestCaseQuality(testCases, issues) * consistencyDeductions.qualityIssue;
    deductions += this.checkScenarioReferences(scenarioIds, testCases, issues) * consistencyDeductions.consistencyIssue;
    deductions += this.checkStructure(plannerOutput, testcaseOutput, issues) * consistencyDeductions.structureIssue;

    return {
      score: roundTo(Math.max(0, maxScore - deductions), 2),
      issues,
      coverage: {
        total_scenarios: scenarioIds.length,
        covered_scenarios: coverage.covered.length,
        total_test_cases: testCases.length,
        coverage_percentage: scenarioIds.length > 0 ? (coverage.covered.length / scenarioIds.length) * 100 : 100
      }
    };
  }

  private checkTestCaseQuality(testCases: Record<string, unknown>[], issues: string[]): number {
    let found = 0;

    for (const testCase of testCases) {
      const id = testCaseLabel(testCase);
      const kinds = readStepKinds(testCase);

      if (!kinds.given) {
        issues.push(`Test case ${id} missing 'Given' step`);
        found += 1;
      }
      if (!kinds.when) {
        issues.push(`Test case ${id} missing 'When' step`);
        found += 1;
      }
      if (!kinds.then) {
        issues.push(`Test case ${id} missing 'Then' step`);
        found += 1;
      }
      if (!hasExpectedResult(testCase)) {
        issues.push(`Test case ${id} missing expected_result`);
        found += 1;
      }
    }

    return found;
  }

  private checkScenarioReferences(scenarioIds: string[], testCases: Record<string, unknown>[], issues: string[]): number {
    if (scenarioIds.length === 0) return 0;

    let found = 0;
    for (const testCase of testCases) {
      if (!referencesAnyScenario(testCase, scenarioIds)) {
        issues.push(`Test case ${testCaseLabel(testCase)} does not reference any scenario`);
        found += 1;
      }
    }
    return found;
  }

  private checkStructure(plannerOutput: unknown, testcaseOutput: unknown, issues: string[]): number {
    const planner = isRecord(plannerOutput) ? plannerOutput : {};
    const testcase = isRecord(testcaseOutput) ? testcaseOutput : {};
    let found = 0;

    if (!isPresent(planner.scenarios)) {
      issues.push("planner_output missing 'scenarios' field");
      found += 1;
    }
    if (!isPresent(planner.features)) {
      issues.push("planner_output missing 'features' field");
      found += 1;
    }
    if (!isPresent(testcase.test_cases)) {
      issues.push("testcase_output missing 'test_cases' field");
      found += 1;
    }

    return found;
  }
}
