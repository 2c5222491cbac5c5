// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

import type { Vector3 } from './types.js';

/** Raised when a zero-length or non-finite vector is normalized. */
export class DegenerateVectorError extends Error {
  constructor(public readonly vector: Readonly<Vector3>) {
    super(`Cannot normalize degenerate vector (${vector.x}, ${vector.y}, ${vector.z})`);
    this.name = 'DegenerateVectorError';
  }
}

/** One failed check in a scene description. */
export interface SceneIssue {
  /** Dotted path into the description, e.g. `spheres.2.radius`. */
  readonly path: string;
  readonly message: string;
}

/** Raised by scene construction; lists every problem found. */
export class SceneValidationError extends Error {
  constructor(public readonly issues: readonly SceneIssue[]) {
    super(
      `Invalid scene description: ${issues
        .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join('; ')}`,
    );
    this.name = 'SceneValidationError';
  }
}

/** Raised when a reused render target does not match the camera. */
export class RenderTargetError extends Error {
  constructor(
    public readonly expected: { width: number; height: number },
    public readonly actual: { width: number; height: number },
  ) {
    super(
      `Render target is ${actual.width}x${actual.height}, camera needs ${expected.width}x${expected.height}`,
    );
    this.name = 'RenderTargetError';
  }
}
