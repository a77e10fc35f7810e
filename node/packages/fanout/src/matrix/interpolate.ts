/**
 * Resolution of ${{ matrix.<axis> }} expressions in step templates
 */

import { ConfigurationError } from "../lib/core/errors.js";
import type { AxisValues } from "./types.js";

const EXPRESSION_REGEX = /\$\{\{\s*(.*?)\s*\}\}/g;
const MATRIX_REFERENCE_REGEX = /^matrix\.([A-Za-z_][A-Za-z0-9_-]*)$/;

/**
 * Replace every ${{ matrix.<axis> }} in a string with the job's value.
 * An axis that is declared but absent from this job (an include-only cell)
 * resolves to an empty string.
 *
 * @throws ConfigurationError for undeclared axes or unsupported expressions
 */
export function interpolateMatrix(
  template: string,
  axes: AxisValues,
  declaredAxes: ReadonlySet<string>,
): string {
  return template.replace(EXPRESSION_REGEX, (_match, expression: string) => {
    const reference = MATRIX_REFERENCE_REGEX.exec(expression);
    if (!reference) {
      throw new ConfigurationError(
        `Unsupported expression "\${{ ${expression} }}" in "${template}"`,
      );
    }

    const axisName = reference[1] ?? "";
    if (!declaredAxes.has(axisName)) {
      throw new ConfigurationError(
        `Expression references undeclared matrix axis "${axisName}"`,
      );
    }

    const value = axes[axisName];
    return value === undefined ? "" : String(value);
  });
}

