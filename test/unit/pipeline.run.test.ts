import assert from "node:assert/strict";
import test from "node:test";
import { describeFailure, runPipeline } from "../../src/engine/pipeline";
import { InputError } from "../../src/errors";
import type { SessionState, StageName } from "../../src/types";
import { countWords } from "../../src/util/text";
import { FINDINGS_TEXT, HAPPY_SCRIPT, TOPIC } from "../support/fixtures";
import { apiError, ScriptedModelClient } from "../support/scriptedModel";

const MODEL = "test-model";

test("runPipeline calls each stage once, in order", async () => {
  const client = new ScriptedModelClient(HAPPY_SCRIPT);
  const result = await runPipeline(TOPIC, { client, model: MODEL, sessionId: "abc" });

  assert.deepEqual(client.stages, ["plan", "findings", "report", "critique"]);
  assert.deepEqual(result.transitions, [
    "idle",
    "plan_pending",
    "findings_pending",
    "report_pending",
    "critique_pending",
    "done",
  ]);
  assert.equal(result.state.status, "done");
  assert.equal(result.state.sessionId, "abc");
  assert.equal(result.state.failure, undefined);
  assert.deepEqual(result.usage, { inputTokens: 40, outputTokens: 80, requests: 4 });
});

test("each stage receives the previous stage's output", async () => {
  const client = new ScriptedModelClient(HAPPY_SCRIPT);
  await runPipeline(TOPIC, { client, model: MODEL });

  assert.match(client.taskFor("findings"), /"feed-in tariff outcomes"/);
  assert.ok(client.taskFor("report").includes(FINDINGS_TEXT));
  assert.ok(client.taskFor("critique").endsWith("- Example Institute policy brief"));
});

test("renewable energy policy scenario meets the stage contracts", async () => {
  const client = new ScriptedModelClient(HAPPY_SCRIPT);
  const { state, warnings } = await runPipeline(TOPIC, { client, model: MODEL });

  assert.ok(state.plan && state.findings && state.report && state.critique);
  assert.ok(state.plan.queries.length >= 3 && state.plan.queries.length <= 5);
  assert.ok(state.plan.queries.every((q) => q.trim().length > 0));
  assert.ok(countWords(state.findings.summary) < 300);
  assert.ok(state.report.wordCount >= 1000);
  assert.ok(state.critique.issues.every((issue) => typeof issue === "string"));
  assert.deepEqual(warnings, []);
});

const LATER: Record<StageName, StageName[]> = {
  plan: ["findings", "report", "critique"],
  findings: ["report", "critique"],
  report: ["critique"],
  critique: [],
};

for (const failing of ["plan", "findings", "report", "critique"] as const) {
  test(`an upstream failure at ${failing} stops the run and keeps earlier results`, async () => {
    const client = new ScriptedModelClient({ ...HAPPY_SCRIPT, [failing]: apiError("Quota exceeded", 429) });
    const { state, transitions } = await runPipeline(TOPIC, { client, model: MODEL });

    assert.equal(client.stages.at(-1), failing);
    for (const later of LATER[failing]) {
      assert.ok(!client.stages.includes(later), `${later} must not run`);
      assert.equal(state[later], undefined);
    }
    for (const earlier of client.stages.slice(0, -1)) {
      assert.notEqual(state[earlier], undefined);
    }
    assert.equal(state[failing], undefined);
    assert.equal(state.status, "failed");
    assert.equal(transitions.at(-1), "failed");
    assert.deepEqual(state.failure, { stage: failing, kind: "upstream", message: "Quota exceeded" });
  });
}

test("a malformed plan fails the run before findings", async () => {
  const client = new ScriptedModelClient({ ...HAPPY_SCRIPT, plan: "Here are some ideas about energy." });
  const { state, transitions } = await runPipeline(TOPIC, { client, model: MODEL });

  assert.deepEqual(client.stages, ["plan"]);
  assert.deepEqual(transitions, ["idle", "plan_pending", "failed"]);
  assert.equal(state.failure?.stage, "plan");
  assert.equal(state.failure?.kind, "malformed");
  assert.equal(state.plan, undefined);
});

test("re-running with a deterministic model yields identical results", async () => {
  const first = await runPipeline(TOPIC, { client: new ScriptedModelClient(HAPPY_SCRIPT), model: MODEL });
  const second = await runPipeline(TOPIC, { client: new ScriptedModelClient(HAPPY_SCRIPT), model: MODEL });

  const stages = (s: SessionState) => JSON.stringify([s.plan, s.findings, s.report, s.critique]);
  assert.equal(stages(first.state), stages(second.state));
  assert.deepEqual(first.transitions, second.transitions);
  assert.deepEqual(first.warnings, second.warnings);
});

test("every snapshot is a new frozen object", async () => {
  const snapshots: SessionState[] = [];
  await runPipeline(TOPIC, {
    client: new ScriptedModelClient(HAPPY_SCRIPT),
    model: MODEL,
    onTransition: (snapshot) => snapshots.push(snapshot),
  });

  assert.equal(snapshots.length, 6);
  assert.ok(snapshots.every((snapshot) => Object.isFrozen(snapshot)));
  assert.equal(new Set(snapshots).size, 6);
  assert.equal(snapshots[1].plan, undefined);
  assert.notEqual(snapshots[2].plan, undefined);
});

test("stage results inside a snapshot are frozen too", async () => {
  const { state } = await runPipeline(TOPIC, { client: new ScriptedModelClient(HAPPY_SCRIPT), model: MODEL });

  assert.ok(state.plan && state.findings && state.report && state.critique);
  assert.ok(Object.isFrozen(state.plan));
  assert.ok(Object.isFrozen(state.plan.queries));
  assert.ok(Object.isFrozen(state.plan.focusAreas));
  assert.ok(Object.isFrozen(state.findings));
  assert.ok(Object.isFrozen(state.report.sources));
  assert.ok(Object.isFrozen(state.report.outline));
  assert.ok(Object.isFrozen(state.critique.issues));
  assert.throws(() => state.plan?.queries.push("extra query"), TypeError);
});

test("runPipeline records when each completed stage finished", async () => {
  const client = new ScriptedModelClient({ ...HAPPY_SCRIPT, critique: apiError("Overloaded", 503) });
  const { completedAt, state } = await runPipeline(TOPIC, { client, model: MODEL });

  assert.equal(state.findings?.source, "Research Agent (test-model)");
  assert.deepEqual(Object.keys(completedAt), ["plan", "findings", "report"]);
  for (const at of Object.values(completedAt)) {
    assert.ok(at);
    assert.equal(new Date(at).toISOString(), at);
  }
});

test("an empty topic is rejected before any stage runs", async () => {
  const client = new ScriptedModelClient(HAPPY_SCRIPT);

  await assert.rejects(runPipeline("  ", { client, model: MODEL }), InputError);
  assert.equal(client.calls.length, 0);
});

test("a short report is a warning by default", async () => {
  const short = "# T\n\n## A\ntext\n## Sources\n- s";
  const client = new ScriptedModelClient({ ...HAPPY_SCRIPT, report: short });
  const { state, warnings } = await runPipeline(TOPIC, { client, model: MODEL });

  assert.equal(state.status, "done");
  assert.deepEqual(warnings, [{ stage: "report", message: "Report has 5 words (expected at least 1000)" }]);
});

test("strict contracts fail the stage that misses its target", async () => {
  const short = "# T\n\n## A\ntext\n## Sources\n- s";
  const client = new ScriptedModelClient({ ...HAPPY_SCRIPT, report: short });
  const { state } = await runPipeline(TOPIC, { client, model: MODEL, strictContracts: true });

  assert.deepEqual(client.stages, ["plan", "findings", "report"]);
  assert.equal(state.status, "failed");
  assert.notEqual(state.findings, undefined);
  assert.equal(state.report, undefined);
  assert.deepEqual(state.failure, {
    stage: "report",
    kind: "malformed",
    message: "Report has 5 words (expected at least 1000)",
  });
});

test("describeFailure names the stage and suggests a retry for malformed output", () => {
  assert.equal(
    describeFailure({ stage: "plan", kind: "malformed", message: "Model reply is not valid JSON" }),
    "Triage Agent (research plan) returned a malformed response: Model reply is not valid JSON. Please run the research again.",
  );
  assert.equal(
    describeFailure({ stage: "critique", kind: "upstream", message: "Quota exceeded" }),
    "Critic Agent (critique) failed: Quota exceeded",
  );
});
