import type { A2AReport, ComponentScores, MetricValue } from "../types";
import { hasExpectedResult, readList, readRecords, readScenarioIds, readStepKinds, roundTo } from "./artifactFields";
import { computeScenarioCoverage } from "./coverage";

export const componentWeights: ComponentScores = {
  completeness: 0.3,
  quality: 0.3,
  alignment: 0.25,
  coverage: 0.15
};

export const recommendationMessages = {
  completeness:
    "Improve scenario coverage: Ensure every scenario from the planner has at least one corresponding test case.",
  quality: "Enhance test case structure: Ensure all test cases include Given/When/Then steps and expected results.",
  edgeCases: "Add edge case scenarios to improve test coverage.",
  bugRisks: "Document bug risks to help identify potential issues.",
  overall: "Overall quality needs improvement. Review planner output and test case generation for better alignment."
} as const;

interface ComponentResult {
  score: number;
  reasoning: string[];
  metrics: Record<string, MetricValue>;
}

const formatPercent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;

export const weightedOverallScore = (scores: ComponentScores): number =>
  roundTo(
    scores.completeness * componentWeights.completeness +
      scores.quality * componentWeights.quality +
      scores.alignment * componentWeights.alignment +
      scores.coverage * componentWeights.coverage,
    2
  );

export class A2AEvaluator {
  evaluate(plannerOutput: unknown, testcaseOutput: unknown): A2AReport {
    const scenarioIds = readScenarioIds(plannerOutput);
    const testCases = readRecords(testcaseOutput, "test_cases");

    const completeness = this.evaluateCompleteness(scenarioIds, testCases);
    const quality = this.evaluateQuality(testCases);
    const alignment = this.evaluateAlignment(plannerOutput, testcaseOutput);
    const coverage = this.evaluateCoverage(
      readList(testcaseOutput, "edge_cases").length,
      readList(testcaseOutput, "bug_risks").length,
      readList(plannerOutput, "scenarios").length
    );

    const componentScores: ComponentScores = {
      completeness: completeness.score,
      quality: quality.score,
      alignment: alignment.score,
      coverage: coverage.score
    };
    const quantitativeMetrics = {
      ...completeness.metrics,
      ...quality.metrics,
      ...alignment.metrics,
      ...coverage.metrics
    };

    return {
      overall_score: weightedOverallScore(componentScores),
      component_scores: componentScores,
      qualitative_reasoning: [...completeness.reasoning, ...quality.reasoning, ...alignment.reasoning, ...coverage.reasoning],
      quantitative_metrics: quantitativeMetrics,
      recommendations: this.buildRecommendations(componentScores, quantitativeMetrics)
    };
  }

  private evaluateCompleteness(scenarioIds: string[], testCases: Record<string, unknown>[]): ComponentResult {
    const { covered, missing } = computeScenarioCoverage(scenarioIds, testCases);
    const ratio = scenarioIds.length > 0 ? covered.length / scenarioIds.length : 1;

    let reasoning: string;
    if (ratio === 1) {
      reasoning = "All scenarios are covered by test cases. Excellent completeness.";
    } else if (ratio >= 0.8) {
      reasoning = `Good coverage (${formatPercent(ratio)}), but ${missing.length} scenario(s) lack test cases: ${missing.join(", ")}`;
    } else {
      reasoning = `Low coverage (${formatPercent(ratio)}). Missing test cases for ${missing.length} scenario(s): ${missing.join(", ")}`;
    }

    return {
      score: ratio * 100,
      reasoning: [reasoning],
      metrics: {
        total_scenarios: scenarioIds.length,
        covered_scenarios: covered.length,
        coverage_ratio: roundTo(ratio, 3)
      }
    };
  }

  private evaluateQuality(testCases: Record<string, unknown>[]): ComponentResult {
    if (testCases.length === 0) {
      return { score: 0, reasoning: ["No test cases found."], metrics: { total_test_cases: 0 } };
    }

    const total = testCases.length;
    let withGivenWhenThen = 0;
    let withExpectedResult = 0;
    let wellStructured = 0;

    for (const testCase of testCases) {
      const kinds = readStepKinds(testCase);
      const gwt = kinds.given && kinds.when && kinds.then;
      const expected = hasExpectedResult(testCase);

      if (gwt) withGivenWhenThen += 1;
      if (expected) withExpectedResult += 1;
      if (gwt && expected) wellStructured += 1;
    }

    const gwtRatio = withGivenWhenThen / total;
    const expectedRatio = withExpectedResult / total;
    const structuredRatio = wellStructured / total;

    let reasoning: string;
    if (structuredRatio >= 0.9) {
      reasoning = `Excellent test case quality: ${wellStructured}/${total} are well-structured with Given/When/Then and expected results.`;
    } else if (structuredRatio >= 0.7) {
      reasoning = `Good test case quality: ${wellStructured}/${total} are well-structured. Some test cases lack proper structure.`;
    } else {
      reasoning = `Test case quality needs improvement: Only ${wellStructured}/${total} are well-structured. Many lack Given/When/Then steps or expected results.`;
    }

    return {
      score: (gwtRatio * 0.5 + expectedRatio * 0.3 + structuredRatio * 0.2) * 100,
      reasoning: [reasoning],
      metrics: {
        total_test_cases: total,
        with_given_when_then: withGivenWhenThen,
        with_expected_result: withExpectedResult,
        well_structured: wellStructured
      }
    };
  }

  private evaluateAlignment(plannerOutput: unknown, testcaseOutput: unknown): ComponentResult {
    const features = readList(plannerOutput, "features").length;
    const scenarios = readList(plannerOutput, "scenarios").length;
    const testCases = readList(testcaseOutput, "test_cases").length;

    const featureAlignment = features > 0 && testCases > 0;
    const scenarioAlignment = scenarios > 0 && testCases > 0;
    const aligned = featureAlignment && scenarioAlignment;

    return {
      score: aligned ? 100 : 50,
      reasoning: [
        aligned
          ? "Outputs are well-aligned: Test cases correspond to planner features and scenarios."
          : "Alignment issues detected: Some planner outputs lack corresponding test cases."
      ],
      metrics: {
        planner_features: features,
        planner_scenarios: scenarios,
        test_cases: testCases,
        feature_alignment: featureAlignment,
        scenario_alignment: scenarioAlignment
      }
    };
  }

  private evaluateCoverage(edgeCases: number, bugRisks: number, scenarios: number): ComponentResult {
    const edgeScore = Math.min(edgeCases * 10, 50);
    const riskScore = Math.min(bugRisks * 10, 50);

    let reasoning: string;
    if (edgeCases > 0 && bugRisks > 0) {
      reasoning = `Good coverage: ${edgeCases} edge case(s) and ${bugRisks} bug risk(s) identified. This shows thorough testing consideration.`;
    } else if (edgeCases > 0) {
      reasoning = `Edge cases identified (${edgeCases}), but no bug risks documented. Consider adding bug risk analysis.`;
    } else if (bugRisks > 0) {
      reasoning = `Bug risks identified (${bugRisks}), but no edge cases documented. Consider adding edge case scenarios.`;
    } else {
      reasoning =
        "No edge cases or bug risks identified. Consider adding edge case scenarios and bug risk analysis for more comprehensive testing.";
    }

    return {
      score: edgeScore + riskScore,
      reasoning: [reasoning],
      metrics: {
        edge_cases: edgeCases,
        bug_risks: bugRisks,
        scenarios
      }
    };
  }

  private buildRecommendations(scores: ComponentScores, metrics: Record<string, MetricValue>): string[] {
    const recommendations: string[] = [];

    if (scores.completeness < 80) recommendations.push(recommendationMessages.completeness);
    if (scores.quality < 80) recommendations.push(recommendationMessages.quality);
    if (metrics.edge_cases === 0) recommendations.push(recommendationMessages.edgeCases);
    if (metrics.bug_risks === 0) recommendations.push(recommendationMessages.bugRisks);

    const mean = (scores.completeness + scores.quality + scores.alignment + scores.coverage) / 4;
    if (mean < 70) recommendations.push(recommendationMessages.overall);

    return recommendations;
  }
}
