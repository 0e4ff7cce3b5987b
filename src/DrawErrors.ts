/**
 * Base class of every error the drawing engine raises on its own.
 * @public
 */
export class ConstructionDrawError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConstructionDrawError';
  }
}

/**
 * A construction was given a different number of arguments than its catalog arity.
 * @public
 */
export class ArgumentCountMismatchError extends ConstructionDrawError {
  readonly constructionName: string;
  readonly expected: number;
  readonly received: number;

  constructor(constructionName: string, expected: number, received: number) {
    super(`Construction "${constructionName}" expects ${expected} argument(s), got ${received}`);
    this.name = 'ArgumentCountMismatchError';
    this.constructionName = constructionName;
    this.expected = expected;
    this.received = received;
  }
}

/**
 * @public
 */
export class UnknownPointNameError extends ConstructionDrawError {
  readonly pointName: string;

  constructor(pointName: string) {
    super(`Unknown point name: "${pointName}"`);
    this.name = 'UnknownPointNameError';
    this.pointName = pointName;
  }
}

/**
 * Derived geometry was requested from collinear, coincident or parallel input.
 * @public
 */
export class DegenerateGeometryError extends ConstructionDrawError {
  constructor(message: string) {
    super(message);
    this.name = 'DegenerateGeometryError';
  }
}
