import dotenv from 'dotenv';

import { parse } from '../common/env-parser';
import { DEFAULT_MAX_SCRIPTINT_SIZE } from '../script/scriptint';

dotenv.config({ path: ['.env.test', '.env.local', '.env'] });

export const OUTPUT_FORMATS = ['hex', 'asm'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliConf {
    scriptintMaxSize: number;
    scriptintRequireMinimal: boolean;
    outputFormat: OutputFormat;
}

export function loadCliConf(): CliConf {
    return {
        scriptintMaxSize: parse.integer('SCRIPTINT_MAX_SIZE', DEFAULT_MAX_SCRIPTINT_SIZE),
        scriptintRequireMinimal: parse.boolean('SCRIPTINT_REQUIRE_MINIMAL', true),
        outputFormat: parse.oneOf('ASM_OUTPUT_FORMAT', OUTPUT_FORMATS, 'hex')
    };
}

export const cliConf: CliConf = loadCliConf();
