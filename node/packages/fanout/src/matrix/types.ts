/**
 * Matrix and job specification types
 */

export type AxisValue = string | number | boolean;

// Axis name -> value for one matrix cell, in axis declaration order
export type AxisValues = Readonly<Record<string, AxisValue>>;

export type MatrixAxis = {
  name: string;
  values: readonly AxisValue[];
};

export type MatrixInclude = {
  values: AxisValues;
  tolerant?: boolean;
};

export type MatrixDeclaration = {
  axes: readonly MatrixAxis[];
  include?: readonly MatrixInclude[];
  exclude?: readonly AxisValues[];
  // Axis values that mark a cell as experimental (tolerant by default)
  experimental?: Readonly<Record<string, readonly AxisValue[]>>;
};

/**
 * Step as declared in a workflow; strings may reference ${{ matrix.<axis> }}
 */
export type StepTemplate = {
  name: string;
  command: string;
  args?: readonly string[];
  cwd?: string;
  env?: Readonly<Record<string, string>>;
};

export type StepSpec = {
  index: number;
  name: string;
  command: string;
  args: readonly string[];
  cwd?: string;
  env: Readonly<Record<string, string>>;
};

export type JobSpec = {
  index: number;
  key: string; // e.g. "channel=stable,os=linux"; unique within a run
  name: string; // e.g. "build (stable, linux)"
  axes: AxisValues;
  tolerant: boolean;
  steps: readonly StepSpec[];
  timeoutMs?: number;
};

/**
 * One matrix cell before steps are attached
 */
export type MatrixCell = {
  axes: AxisValues;
  tolerant: boolean;
};
