/**
 * Self-checking testbench prompt
 *
 * The marker lines are the contract with the verification runner: a vector
 * counts only if it prints a marker, and the run counts only if it prints the
 * completion marker.
 */

import type { PlanNode } from '../design_types';
import { SIMULATION_MARKERS } from '../verification_runner';

export function getHarnessTask(node: PlanNode, implementation: string): string {
    const { PASS, FAIL, DONE } = SIMULATION_MARKERS;

    return `Write a self-checking Verilog testbench module named \`tb_${node.name}\` for the module below.

1. Instantiate \`${node.name}\` as the unit under test.
2. Generate a clock if the design is sequential; apply reset first.
3. Apply test vectors covering normal operation and corner cases of: ${node.description}
4. After checking each vector, print exactly one line with \`$display\`:
   - \`${PASS} <vector description>\` when the output matches the expected value
   - \`${FAIL} <vector description> expected=<value> got=<value>\` otherwise
5. After the last vector print \`${DONE}\` and then call \`$finish\`.
6. Do NOT include the design module code. Output ONLY the testbench module.

--- Design Under Test ---
${implementation}`;
}
