// Run with: npm run example
// counterFooTwice fails: foo() only succeeds on its first call.
import { addTest } from '../src/index.js';
import { counterFoo, counterFooTwice } from './counter.js';

addTest(counterFoo);
addTest(counterFooTwice);
