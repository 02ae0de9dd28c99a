/**
 * Example: Listing the Test Cases of a Downloaded Problem
 *
 * Scenario: sample cases were saved as `test/sample-1.in`,
 * `test/sample-1.out`, ... and an editor left `test/#sample-2.in#`
 * behind. The locator pairs the real files and warns about the rest.
 *
 * A missing input, a stray file or an empty directory ends the run
 * with a tagged error and exit status 1.
 *
 * Run: npx tsx examples/discover-test-cases.ts [directory] [format]
 */
import { TestCaseLocator, isTestCaseFormatError } from '../src/index.js';
import type { Reporter } from '../src/index.js';

const consoleReporter: Reporter = {
    report: (level, message) => {
        if (level === 'debug') return;
        const line = `[${level}] ${message}`;
        if (level === 'error' || level === 'warning') console.error(line);
        else console.log(line);
    },
};

const [directory = 'test', format = '%s.%e'] = process.argv.slice(2);

try {
    const locator = new TestCaseLocator({ directory, format, reporter: consoleReporter });
    for (const [name, files] of locator.discover()) {
        console.log(`${name}: ${files.in}${files.out ? ` -> ${files.out}` : ' (no expected output)'}`);
    }
    console.log(`next sample goes to ${locator.pathFor('next', 'in')}`);
} catch (error) {
    if (!isTestCaseFormatError(error)) throw error;
    process.exitCode = 1;
}
