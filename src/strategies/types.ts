export interface Strategy {
    readonly name: string;
    init(): Promise<void>;
    /** Resolves once every market worker has ended; rejects when one ended on a fatal error. */
    run(): Promise<void>;
    cleanup(): Promise<void>;
}
