export enum ExecErrorCode {
    MinimalData = 'MinimalData',
    ScriptIntNumericOverflow = 'ScriptIntNumericOverflow'
}

const messages: { [code in ExecErrorCode]: string } = {
    [ExecErrorCode.MinimalData]: 'non-minimal datapush',
    [ExecErrorCode.ScriptIntNumericOverflow]: 'script integer numeric overflow'
};

/**
 * Failure raised to a script interpreter. Only the codes the scriptint codec maps into are
 * declared here.
 */
export class ExecError extends Error {
    readonly code: ExecErrorCode;

    constructor(code: ExecErrorCode) {
        super(messages[code]);
        this.name = 'ExecError';
        this.code = code;
    }
}
