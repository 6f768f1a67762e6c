/**
 * Implementation prompt for one plan node
 */

import type { PlanNode } from '../design_types';
import { formatPort } from './format';

export function getImplementationTask(node: PlanNode): string {
    const ports = node.ports.map(p => `- ${formatPort(p)}`).join('\n');
    const deps = node.dependencies.length > 0
        ? `\nInstantiate these already-verified modules where appropriate: ${node.dependencies.join(', ')}.\nDo NOT redefine them; their source is compiled alongside yours.\n`
        : '';

    return `Write the Verilog module \`${node.name}\`.

Behavior:
${node.description}

Ports (names, directions and widths are fixed):
${ports}
${deps}
Return ONLY the module \`${node.name}\` in a single \`\`\`verilog code block.`;
}
