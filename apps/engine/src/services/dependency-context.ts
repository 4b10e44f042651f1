import { StepResult } from '@agentchain/sdk';

export function contextBlock(stepName: string, response: string): string {
    return `\n\n--- Context from ${stepName} ---\n${response}\n--- End of context from ${stepName} ---`;
}

export function warningBlock(stepName: string, status: string): string {
    return `\n\n[Warning] ${stepName} did not succeed (status: ${status})`;
}

/**
 * Builds the message actually sent to a step's agent: the original text,
 * then one block per dependency in `dependsOn` order. Successful dependencies
 * contribute their response; any other outcome a warning naming the status.
 * Dependencies without a result yet contribute nothing.
 */
export function enhanceMessage(
    message: string,
    dependsOn: readonly string[],
    results: ReadonlyMap<string, StepResult>,
): string {
    let enhanced = message;
    for (const dep of dependsOn) {
        const result = results.get(dep);
        if (!result) continue;
        enhanced += result.status === 'success'
            ? contextBlock(dep, result.response)
            : warningBlock(dep, result.status);
    }
    return enhanced;
}
