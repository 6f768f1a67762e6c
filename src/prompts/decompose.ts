/**
 * Decomposition prompt: design request -> JSON module graph
 */

import type { DesignRequest } from '../design_types';
import { formatPort } from './format';

export function getDecompositionPrompt(request: DesignRequest): string {
    const hints = request.interfaceHints && request.interfaceHints.length > 0
        ? `\nThe top module MUST expose exactly these ports:\n${request.interfaceHints.map(p => `- ${formatPort(p)}`).join('\n')}\n`
        : '';
    const topName = request.topName ? `\nThe top module MUST be named \`${request.topName}\`.\n` : '';

    return `Decompose the following hardware design request into a hierarchy of Verilog modules.

REQUEST:
${request.prompt}
${hints}${topName}
Output: JSON object with a 'modules' key containing an array of module objects.
Structure:
{ "modules": [ { "name": "...", "description": "...", "ports": [ { "name": "...", "direction": "input|output|inout", "width": 1 } ], "dependencies": ["..."] } ] }

Rules:
1. Every module name is a valid Verilog identifier and unique.
2. "dependencies" lists ONLY the modules this module instantiates directly.
3. No cycles: a module never (directly or indirectly) instantiates itself.
4. Exactly ONE module (the top) is not instantiated by any other module.
5. Prefer small, independently testable leaf modules; use a single module when the design is simple.
6. "width" is the bit width as a positive integer.
7. ONLY RETURN THE JSON. NO OTHER TEXT.`;
}
