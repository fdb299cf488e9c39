export { AsmParseErrorKind, ParseAsmError, describeAsmParseErrorKind, parseAsm } from './script/asm/parse-asm';
export { ScriptFormatError, formatAsm } from './script/asm/format-asm';
export { Position, Word, iterWords, stripComment } from './script/asm/tokenizer';
export { MAX_PUSH_SIZE, ScriptBuilder, minimalPushOpcode } from './script/builder';
export { ExecError, ExecErrorCode } from './script/exec-error';
export { parseHex, toHex, tryParseHex } from './script/hex';
export {
    NamedOpcodeTable,
    OP_0,
    OP_1,
    OP_16,
    OP_1NEGATE,
    OP_PUSHDATA1,
    OP_PUSHDATA2,
    OP_PUSHDATA4,
    OpcodeTable,
    defaultOpcodeTable
} from './script/opcodes';
export {
    LOCK_TIME_DISABLE_FLAG_MASK,
    LOCK_TYPE_MASK,
    LockTime,
    LockTimeType,
    formatLockTime,
    fromNum,
    lockTimeSeconds,
    lockTimeToConsensus
} from './script/relative-locktime';
export {
    DEFAULT_MAX_SCRIPTINT_SIZE,
    ScriptIntError,
    ScriptIntErrorKind,
    readScriptint,
    readScriptintNonMinimal,
    readScriptintSize,
    scriptintVec,
    writeScriptint
} from './script/scriptint';
