/**
 * Token renewal step
 */

import { RenewError } from "../errors";
import type { EventReporter } from "../events";
import { describeFailure } from "../process/runner";
import type { VaultClient } from "../vault/client";

export async function renewToken(client: VaultClient, reporter: EventReporter): Promise<void> {
  const result = await client.renewToken();

  if (!result.success) {
    throw new RenewError(describeFailure(result, client.timeoutMs), result.exitCode);
  }

  await reporter.tokenRenewed();
}
