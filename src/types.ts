export type StageName = "planner_output" | "testcase_output" | "automation_output" | "global_validation_output";

export const stageNames: readonly StageName[] = [
  "planner_output",
  "testcase_output",
  "automation_output",
  "global_validation_output"
];

export type StageKind = "planner" | "generator" | "validator";

export type PipelineState =
  | "INIT"
  | "PLANNING"
  | "MEMORY_LOOKUP"
  | "GENERATING"
  | "VALIDATING"
  | "PERSISTED"
  | "DONE"
  | "FAILED";

export type Artifact = Record<string, unknown>;

export type StageErrorArtifact = {
  error: "invalid output";
  raw_output: string;
  valid?: false;
};

export interface SessionMetadata {
  title: string;
  qa_context: string;
  created_at: string;
}

export interface Session {
  id: string;
  metadata: SessionMetadata;
  stages: Record<StageName, Artifact | null>;
}

export interface Scenario {
  scenario_id: string;
  title: string;
  acceptance_criteria: string;
  tags: string[];
}

export interface TestCase {
  id: string;
  title: string;
  preconditions: string[];
  steps: string[];
  expected_result: string;
}

export interface EdgeCase {
  id: string;
  description: string;
}

export type BugRisk = EdgeCase;

export interface PlannerOutput {
  features: string[];
  scenarios: Scenario[];
  notes: string[];
  acceptance_criteria_input: string[];
}

export interface TestcaseOutput {
  test_cases: TestCase[];
  edge_cases: EdgeCase[];
  bug_risks: BugRisk[];
  planner_output: Artifact;
}

export interface ValidationOutput {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface MemoryExample {
  story_id: string;
  title: string;
  acceptance_criteria: string[];
  planner_output: Artifact;
  testcase_output: Artifact;
  qa_context: string;
}

export interface StoryInput {
  sessionId: string;
  title: string;
  description: string;
  acceptanceCriteria: string[];
  qaContext: string;
}

export interface PipelineResult {
  session_id: string;
  title: string;
  qa_context: string;
  planner_output: Artifact;
  testcase_output: Artifact;
  global_validation_output: Artifact;
}

export interface ConsistencyCoverage {
  total_scenarios: number;
  covered_scenarios: number;
  total_test_cases: number;
  coverage_percentage: number;
}

export interface ConsistencyReport {
  score: number;
  issues: string[];
  coverage: ConsistencyCoverage;
}

export interface ComponentScores {
  completeness: number;
  quality: number;
  alignment: number;
  coverage: number;
}

export type MetricValue = number | boolean;

export interface A2AReport {
  overall_score: number;
  component_scores: ComponentScores;
  qualitative_reasoning: string[];
  quantitative_metrics: Record<string, MetricValue>;
  recommendations: string[];
}

export interface ExportResult {
  status: "success";
  path: string;
  bytes_written: number;
}
