/**
 * Base for concrete methods.
 *
 * A concrete method owns a Method whose name it fixes, exposes the method
 * independent controls through delegation, and renders its own keywords
 * after the Method lines.
 */

import type { FieldResult } from "../blocks/validation.js";
import { Method, type MethodBlock } from "./method.js";

export abstract class ComposedMethod implements MethodBlock {
  protected constructor(private readonly base: Method) {}

  get method(): string {
    return this.base.method;
  }

  get maxIterations(): number | undefined {
    return this.base.maxIterations;
  }

  get convergenceTolerance(): number | undefined {
    return this.base.convergenceTolerance;
  }

  setMaxIterations(value: unknown): FieldResult<number | undefined> {
    return this.base.setMaxIterations(value);
  }

  setConvergenceTolerance(value: unknown): FieldResult<number | undefined> {
    return this.base.setConvergenceTolerance(value);
  }

  render(): string {
    return this.base.render() + this.renderFields();
  }

  /** Keyword lines following the method independent controls. */
  protected abstract renderFields(): string;
}
