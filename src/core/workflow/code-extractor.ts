/**
 * Code extractor — pulls the test file body out of an LLM reply.
 *
 * The first fenced block wins; a reply without fences is taken as code
 * as-is. Only a `python` language tag is stripped, matching the files
 * the generation prompt asks for.
 *
 * Dependency direction: code-extractor.ts → nothing
 * Used by: workflow controller
 */

const FENCED_BLOCK = /```(?:python)?\s*([\s\S]*?)\s*```/;
const UNCLOSED_FENCE = /```(?:python)?\s*([\s\S]*)$/;

export function extractCode(response: string): string {
    const block = FENCED_BLOCK.exec(response);
    if (block) {
        return (block[1] ?? '').trim();
    }

    // A reply cut off mid-block: keep what follows the opening marker.
    const unclosed = UNCLOSED_FENCE.exec(response);
    if (unclosed) {
        return (unclosed[1] ?? '').trim();
    }

    return response.trim();
}
