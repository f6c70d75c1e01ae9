/**
 * External tool module
 */

export type { ExternalRequest, ExternalResult, ExternalRunner } from "./external";
export { ProcessRunner, formatCommand } from "./external";
export { PulumiCli, actionArgs, stackInitArgs, stackSelectArgs } from "./pulumi";
