/**
 * TestCaseErrors — Tagged Failures
 *
 * Every failure the package raises on purpose carries a `_tag`, so callers
 * can branch on the kind without string matching. None of them are retried:
 * they all come from deterministic input validation.
 */
import type { ExtensionTag } from './types.js';

export type TestCaseFormatErrorTag =
    | 'MalformedFormat'
    | 'InvalidFormat'
    | 'UndefinedPlaceholder'
    | 'UnrecognizedFile'
    | 'DuplicateTestCaseFile'
    | 'DanglingOutput'
    | 'NoCasesFound';

export abstract class TestCaseFormatError extends Error {
    abstract readonly _tag: TestCaseFormatErrorTag;

    toJSON(): Record<string, unknown> {
        return { _tag: this._tag, name: this.name, message: this.message };
    }
}

/** The format ends with a `%` that has nothing to escape. */
export class MalformedFormatError extends TestCaseFormatError {
    readonly _tag = 'MalformedFormat' as const;

    constructor(readonly format: string) {
        super(`Format "${format}" ends with a lone "%". Write "%%" for a literal percent sign.`);
        this.name = 'MalformedFormatError';
    }
}

/** The format is well-formed but cannot locate test cases. */
export class InvalidFormatError extends TestCaseFormatError {
    readonly _tag = 'InvalidFormat' as const;

    constructor(readonly format: string, reason: string) {
        super(`Format "${format}": ${reason}`);
        this.name = 'InvalidFormatError';
    }
}

export class UndefinedPlaceholderError extends TestCaseFormatError {
    readonly _tag = 'UndefinedPlaceholder' as const;

    constructor(readonly key: string, readonly format: string) {
        super(`Format "${format}" uses placeholder "%${key}", which has no definition.`);
        this.name = 'UndefinedPlaceholderError';
    }
}

export class UnrecognizedFileError extends TestCaseFormatError {
    readonly _tag = 'UnrecognizedFile' as const;

    constructor(readonly path: string, readonly format: string) {
        super(`unrecognizable file found: ${path} (format: "${format}")`);
        this.name = 'UnrecognizedFileError';
    }
}

/** Two candidates claimed the same slot of one test case. */
export class DuplicateTestCaseFileError extends TestCaseFormatError {
    readonly _tag = 'DuplicateTestCaseFile' as const;

    constructor(
        readonly caseName: string,
        readonly ext: ExtensionTag,
        readonly paths: readonly [string, string],
    ) {
        super(`test case "${caseName}" has more than one ${ext} file: ${paths[0]}, ${paths[1]}`);
        this.name = 'DuplicateTestCaseFileError';
    }
}

/** An output file exists with no input under the same name. */
export class DanglingOutputError extends TestCaseFormatError {
    readonly _tag = 'DanglingOutput' as const;

    constructor(readonly caseName: string, readonly paths: readonly string[]) {
        super(`dangling output case: ${paths.join(', ')}`);
        this.name = 'DanglingOutputError';
    }
}

export class NoCasesFoundError extends TestCaseFormatError {
    readonly _tag = 'NoCasesFound' as const;

    constructor(readonly directory: string, readonly format: string) {
        super(`no cases found in ${directory} (format: "${format}")`);
        this.name = 'NoCasesFoundError';
    }
}

export function isTestCaseFormatError(error: unknown): error is TestCaseFormatError {
    return error instanceof TestCaseFormatError;
}
