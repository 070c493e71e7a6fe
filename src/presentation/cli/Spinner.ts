import ora, { Ora } from 'ora';

/**
 * Progress indicator shown while a long operation runs
 */
export interface Spinner {
    start(text?: string): Spinner;
    stop(): Spinner;
    fail(text?: string): Spinner;
}

/**
 * Spinner that prints nothing
 */
export class SilentSpinner implements Spinner {
    start(_text?: string): Spinner {
        return this;
    }

    stop(): Spinner {
        return this;
    }

    fail(_text?: string): Spinner {
        return this;
    }
}

/**
 * Wrapper around ora
 */
export class OraSpinner implements Spinner {
    private readonly ora: Ora = ora();

    start(text?: string): Spinner {
        this.ora.start(text);
        return this;
    }

    stop(): Spinner {
        this.ora.stop();
        return this;
    }

    fail(text?: string): Spinner {
        this.ora.fail(text);
        return this;
    }
}

export type SpinnerFactory = () => Spinner;

/**
 * ora spinner on an interactive terminal, silent otherwise
 */
export const createSpinner: SpinnerFactory = () =>
    process.stderr.isTTY ? new OraSpinner() : new SilentSpinner();
