/**
 * @module commands/routes
 * `specmock routes <spec>`: print the route table built from a contract.
 */

import { Command } from 'commander';
import { buildRouteTable, loadContract, type Contract } from 'specmock-core';

const RED = '\x1b[31m';
const GRAY = '\x1b[90m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

export function registerRoutes(program: Command): void {
  program
    .command('routes')
    .description('Print the method/path routes a contract registers')
    .argument('<spec>', 'OpenAPI contract file (YAML or JSON)')
    .action(async (spec: string) => {
      let contract: Contract;
      try {
        contract = await loadContract(spec);
      } catch (err) {
        console.error(`${RED}${err instanceof Error ? err.message : String(err)}${RESET}`);
        process.exitCode = 1;
        return;
      }

      const table = buildRouteTable(contract);

      console.log(`\n${BOLD}${contract.title}${RESET} ${GRAY}(OpenAPI ${contract.openApiVersion})${RESET}\n`);
      for (const entry of table) {
        const operationId = entry.operation.operationId
          ? `  ${GRAY}${entry.operation.operationId}${RESET}`
          : '';
        console.log(`  ${entry.method.padEnd(7)} ${entry.path}${operationId}`);
      }
      console.log(`\n  ${table.length} routes\n`);
    });
}
