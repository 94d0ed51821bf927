/** Raised when no candidate remains consistent with the feedback received */
export class ContradictionError extends Error {
    constructor(message = 'No candidates remain (inconsistent feedback?)') {
        super(message);
        this.name = 'ContradictionError';
    }
}

/** Raised when typed feedback cannot be read as five tiles */
export class FeedbackFormatError extends Error {
    readonly input: string;

    constructor(input: string) {
        super(`Invalid feedback format: ${input}`);
        this.name = 'FeedbackFormatError';
        this.input = input;
    }
}
