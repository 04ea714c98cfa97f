/**
 * Tests for the generic method block.
 *
 * Run: node --import tsx src/method/method.test.ts
 */

import { strict as assert } from "node:assert";
import { unwrap } from "../blocks/validation.js";
import { Method } from "./method.js";

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
// Creation and rendering
// ---------------------------------------------------------------------------

test("renders only the method name when no controls are set", () => {
  const method = unwrap(Method.create({ method: "vector_parameter_study" }));
  assert.equal(method.render(), "method\n  vector_parameter_study\n");
});

test("defaults to a vector parameter study", () => {
  const method = unwrap(Method.create());
  assert.equal(method.method, "vector_parameter_study");
  assert.equal(method.maxIterations, undefined);
  assert.equal(method.convergenceTolerance, undefined);
});

test("renders the method independent controls when set", () => {
  const method = unwrap(
    Method.create({ method: "optpp_q_newton", maxIterations: 50, convergenceTolerance: 0.001 })
  );
  assert.equal(
    method.render(),
    "method\n" +
      "  optpp_q_newton\n" +
      "    max_iterations = 50\n" +
      "    convergence_tolerance = 0.001\n"
  );
});

test("renders identical text on repeated calls", () => {
  const method = unwrap(Method.create({ maxIterations: 5, convergenceTolerance: 0.2 }));
  assert.equal(method.render(), method.render());
});

test("collects every invalid option on creation", () => {
  const result = Method.create({ maxIterations: -5, convergenceTolerance: 2 });
  assert.equal(result.success, false);
  if (!result.success) {
    assert.deepEqual(
      result.issues.map((issue) => [issue.field, issue.kind]),
      [
        ["maxIterations", "invalid_value"],
        ["convergenceTolerance", "invalid_value"],
      ]
    );
  }
});

test("rejects a fractional max iterations on creation as a type mismatch", () => {
  const result = Method.create({ maxIterations: 2.5 });
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.issues[0].kind, "type_mismatch");
    assert.equal(result.issues[0].message, "Max iterations must be an integer");
  }
});

// ---------------------------------------------------------------------------
// Setters
// ---------------------------------------------------------------------------

test("accepts convergence tolerances inside (0, 1)", () => {
  const method = unwrap(Method.create());
  for (const value of [0.5, 0.001, 0.999]) {
    const result = method.setConvergenceTolerance(value);
    assert.equal(result.success, true);
    assert.equal(method.convergenceTolerance, value);
    assert.ok(method.render().includes(`    convergence_tolerance = ${value}\n`));
  }
});

test("rejects convergence tolerances outside (0, 1) and keeps the old value", () => {
  const method = unwrap(Method.create({ convergenceTolerance: 0.01 }));
  for (const value of [0, 1, -0.1, 1.5]) {
    const result = method.setConvergenceTolerance(value);
    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.error.kind, "invalid_value");
      assert.equal(result.error.message, "Convergence tolerance must be on (0,1)");
    }
    assert.equal(method.convergenceTolerance, 0.01);
  }
});

test("rejects a string convergence tolerance as a type mismatch", () => {
  const method = unwrap(Method.create());
  const result = method.setConvergenceTolerance("0.5");
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.kind, "type_mismatch");
  }
  assert.equal(method.convergenceTolerance, undefined);
});

test("rejects a non-string method name", () => {
  const method = unwrap(Method.create());
  const result = method.setMethod(42);
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.field, "method");
    assert.equal(result.error.kind, "type_mismatch");
    assert.equal(result.error.message, "Method must be a string");
  }
  assert.equal(method.method, "vector_parameter_study");
});

test("renames the method", () => {
  const method = unwrap(Method.create());
  assert.equal(method.setMethod("centered_parameter_study").success, true);
  assert.equal(method.render(), "method\n  centered_parameter_study\n");
});

test("validates max iterations", () => {
  const method = unwrap(Method.create({ maxIterations: 10 }));

  const fractional = method.setMaxIterations(2.5);
  assert.equal(fractional.success, false);
  if (!fractional.success) {
    assert.equal(fractional.error.kind, "type_mismatch");
  }

  const negative = method.setMaxIterations(-1);
  assert.equal(negative.success, false);
  if (!negative.success) {
    assert.equal(negative.error.kind, "invalid_value");
  }

  assert.equal(method.maxIterations, 10);
});

test("unsets an optional control with undefined", () => {
  const method = unwrap(Method.create({ maxIterations: 10 }));
  assert.equal(method.setMaxIterations(undefined).success, true);
  assert.equal(method.maxIterations, undefined);
  assert.equal(method.render(), "method\n  vector_parameter_study\n");
});

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);

if (failed > 0) {
  process.exit(1);
}
