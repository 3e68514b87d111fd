import assert from "node:assert/strict";
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { exportRun, parseResearchArgs } from "../../src/cli/research";
import { runPipeline } from "../../src/engine/pipeline";
import { createLogger } from "../../src/util/logger";
import { HAPPY_SCRIPT, TOPIC } from "../support/fixtures";
import { ScriptedModelClient } from "../support/scriptedModel";

test("parseResearchArgs joins topic words and applies defaults", () => {
  assert.deepEqual(parseResearchArgs(["renewable", "energy", "policy"], "./reports"), {
    topic: "renewable energy policy",
    outDir: "./reports",
    export: true,
    strict: false,
    json: false,
  });
});

test("parseResearchArgs reads flags", () => {
  const args = parseResearchArgs(["--strict", "solar", "--out", "out/dir", "--no-export", "--json"], "./reports");

  assert.equal(args.topic, "solar");
  assert.equal(args.outDir, "out/dir");
  assert.equal(args.export, false);
  assert.equal(args.strict, true);
  assert.equal(args.json, true);
});

test("parseResearchArgs rejects a missing topic or unknown flags", () => {
  assert.throws(() => parseResearchArgs([], "./reports"), /^Error: Usage: research/);
  assert.throws(() => parseResearchArgs(["topic", "--verbose"], "./reports"), /Unknown option --verbose/);
  assert.throws(() => parseResearchArgs(["topic", "--out"], "./reports"), /--out needs a directory/);
});

test("exportRun writes every stage and reports success", async () => {
  const dir = mkdtempSync(join(tmpdir(), "research-cli-"));
  try {
    const result = await runPipeline(TOPIC, { client: new ScriptedModelClient(HAPPY_SCRIPT), model: "m" });
    const lines: string[] = [];
    const logger = createLogger({ sink: (_level, line) => lines.push(line) });

    assert.equal(exportRun(result, dir, logger), true);
    assert.equal(readdirSync(dir).length, 5);
    assert.equal(lines.length, 4);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("exportRun logs a failed write instead of throwing", async () => {
  const dir = mkdtempSync(join(tmpdir(), "research-cli-"));
  try {
    const blocker = join(dir, "taken");
    writeFileSync(blocker, "not a directory");
    const result = await runPipeline(TOPIC, { client: new ScriptedModelClient(HAPPY_SCRIPT), model: "m" });
    const seen: string[] = [];
    const logger = createLogger({ sink: (level, line) => seen.push(`${level} ${line}`) });

    assert.equal(exportRun(result, join(blocker, "sub"), logger), false);
    assert.equal(seen.length, 1);
    assert.match(seen[0], /^error .*\[ERROR\] \[Research\] Export failed .*(ENOTDIR|EEXIST)/);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
