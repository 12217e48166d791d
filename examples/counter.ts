import { failTestIf, testSuccessRequires } from '../src/index.js';

/**
 * Stand-in for a class under test, with what would be private state exposed
 * so the test can inspect it.
 */
export class Counter {
  state = 0;

  /** Succeeds the first time only. */
  foo(): boolean {
    if (this.state === 0) {
      this.state++;
      return true;
    }
    return false;
  }

  bar(): void {
    this.state = 0;
  }
}

export function counterFoo(): boolean {
  const counter = new Counter();

  // Public API
  failTestIf(() => !counter.foo());

  // State behind foo() and bar()
  testSuccessRequires(() => counter.state === 1);
  counter.bar();
  failTestIf(() => counter.state !== 0);

  return true;
}

export function counterFooTwice(): boolean {
  const counter = new Counter();
  counter.foo();

  testSuccessRequires(() => counter.foo());

  return true;
}
