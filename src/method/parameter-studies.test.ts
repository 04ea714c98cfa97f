/**
 * Tests for the parameter study method blocks.
 *
 * Run: node --import tsx src/method/parameter-studies.test.ts
 */

import { strict as assert } from "node:assert";
import { unwrap } from "../blocks/validation.js";
import {
  CenteredParameterStudy,
  MultidimParameterStudy,
  VectorParameterStudy,
} from "./parameter-studies.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void) {
  try {
    fn();
    passed++;
    console.log(`  PASS: ${name}`);
  } catch (err) {
    failed++;
    console.error(`  FAIL: ${name}`);
    console.error(`    ${(err as Error).message}`);
  }
}

// ---------------------------------------------------------------------------
// Vector parameter study
// ---------------------------------------------------------------------------

test("renders the default vector parameter study", () => {
  const study = unwrap(VectorParameterStudy.create());
  assert.equal(
    study.render(),
    "method\n" +
      "  vector_parameter_study\n" +
      "    final_point = 1.1 1.3\n" +
      "    num_steps = 10\n"
  );
});

test("accepts a bare final point for a single variable", () => {
  const study = unwrap(VectorParameterStudy.create({ finalPoint: 0.5, numSteps: 4 }));
  assert.deepEqual(study.finalPoint, [0.5]);
  assert.equal(
    study.render(),
    "method\n  vector_parameter_study\n    final_point = 0.5\n    num_steps = 4\n"
  );
});

test("places method independent controls before the study keywords", () => {
  const study = unwrap(VectorParameterStudy.create());
  assert.equal(study.setMaxIterations(20).success, true);
  assert.equal(
    study.render(),
    "method\n" +
      "  vector_parameter_study\n" +
      "    max_iterations = 20\n" +
      "    final_point = 1.1 1.3\n" +
      "    num_steps = 10\n"
  );
});

test("validates the vector study keywords", () => {
  const study = unwrap(VectorParameterStudy.create());

  const zeroSteps = study.setNumSteps(0);
  assert.equal(zeroSteps.success || zeroSteps.error.kind, "invalid_value");

  const empty = study.setFinalPoint([]);
  assert.equal(empty.success || empty.error.kind, "invalid_value");

  const text = study.setFinalPoint(["a"]);
  assert.equal(text.success || text.error.kind, "type_mismatch");

  assert.equal(study.numSteps, 10);
  assert.deepEqual(study.finalPoint, [1.1, 1.3]);
});

// ---------------------------------------------------------------------------
// Centered parameter study
// ---------------------------------------------------------------------------

test("renders the default centered parameter study", () => {
  const study = unwrap(CenteredParameterStudy.create());
  assert.equal(
    study.render(),
    "method\n" +
      "  centered_parameter_study\n" +
      "    step_vector = 0.4 0.5\n" +
      "    steps_per_variable = 2 3\n"
  );
});

test("rejects step vectors and step counts of different lengths", () => {
  const result = CenteredParameterStudy.create({
    stepVector: [0.1, 0.2, 0.3],
    stepsPerVariable: [1, 1],
  });
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.issues.length, 1);
    assert.equal(result.issues[0].field, "stepsPerVariable");
    assert.equal(result.issues[0].kind, "invalid_value");
    assert.equal(result.issues[0].code, "cross_field");
  }
});

test("keeps step lengths aligned on assignment", () => {
  const study = unwrap(CenteredParameterStudy.create());
  const result = study.setStepVector([1]);
  assert.equal(result.success || result.error.kind, "invalid_value");
  assert.deepEqual(study.stepVector, [0.4, 0.5]);
  assert.equal(study.setStepsPerVariable([4, 4]).success, true);
  assert.deepEqual(study.stepsPerVariable, [4, 4]);
});

test("grows both step sequences together", () => {
  const study = unwrap(CenteredParameterStudy.create());
  const result = study.setSteps([0.1, 0.2, 0.3], [1, 1, 1]);
  assert.equal(result.success, true);
  assert.equal(
    study.render(),
    "method\n" +
      "  centered_parameter_study\n" +
      "    step_vector = 0.1 0.2 0.3\n" +
      "    steps_per_variable = 1 1 1\n"
  );
});

test("keeps both step sequences when a combined update fails", () => {
  const study = unwrap(CenteredParameterStudy.create());
  const result = study.setSteps([1, 2, 3], [1]);
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(
      result.issues[0].message,
      "stepVector and stepsPerVariable must have the same length (expected 3)"
    );
  }
  assert.deepEqual(study.stepVector, [0.4, 0.5]);
  assert.deepEqual(study.stepsPerVariable, [2, 3]);
});

// ---------------------------------------------------------------------------
// Multidimensional parameter study
// ---------------------------------------------------------------------------

test("renders the default multidimensional parameter study", () => {
  const study = unwrap(MultidimParameterStudy.create());
  assert.equal(
    study.render(),
    "method\n  multidim_parameter_study\n    partitions = 10 8\n"
  );
});

test("validates partitions", () => {
  const study = unwrap(MultidimParameterStudy.create({ partitions: [3, 3] }));

  const fractional = study.setPartitions([3, 2.5]);
  assert.equal(fractional.success || fractional.error.kind, "type_mismatch");

  const negative = study.setPartitions(-1);
  assert.equal(negative.success || negative.error.kind, "invalid_value");

  assert.deepEqual(study.partitions, [3, 3]);
});

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);

if (failed > 0) {
  process.exit(1);
}
