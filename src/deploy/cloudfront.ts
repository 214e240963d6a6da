import crypto from "node:crypto";
import { CreateInvalidationCommand, type CloudFrontClient } from "@aws-sdk/client-cloudfront";
import { errorMessage, siteError } from "../lib/errors.js";

export const INVALIDATE_ALL = ["/*"];

export type InvalidateOptions = {
  client: CloudFrontClient;
  distributionId?: string | null;
  paths?: readonly string[];
  callerReference?: string;
};

export function newCallerReference(): string {
  return `endodoncia-${crypto.randomBytes(8).toString("hex")}`;
}

/** Creates an invalidation and returns its id; without a distribution id nothing is sent. */
export async function invalidateDistribution(options: InvalidateOptions): Promise<string | null> {
  const distributionId = String(options.distributionId || "").trim();
  if (!distributionId) return null;

  const paths = [...(options.paths ?? INVALIDATE_ALL)];
  try {
    const res = await options.client.send(
      new CreateInvalidationCommand({
        DistributionId: distributionId,
        InvalidationBatch: {
          Paths: { Quantity: paths.length, Items: paths },
          CallerReference: options.callerReference ?? newCallerReference()
        }
      })
    );
    const id = res.Invalidation?.Id;
    if (!id) throw new Error("response carried no invalidation id");
    return id;
  } catch (err) {
    throw siteError("invalidation_failed", `${distributionId}: ${errorMessage(err)}`, err);
  }
}
