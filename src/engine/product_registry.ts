import type { Redis } from "ioredis";
import { z } from "zod";

import { componentLogger } from "./logger.js";
import { buildProductListKey } from "./utils.js";

const logger = componentLogger("registry");

const MAX_SLUG_LENGTH = 64;

/** Slugs end up inside Redis key names, so separators and whitespace are refused. */
export const productSlugSchema = z
  .string()
  .trim()
  .min(1)
  .max(MAX_SLUG_LENGTH)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "product slug may only hold letters, digits, '.', '_' and '-'");

export interface ProductRegistration {
  products: string[];
  rejected: string[];
}

export function parseProductSlugs(members: readonly string[]): ProductRegistration {
  const accepted = new Set<string>();
  const rejected: string[] = [];

  for (const member of members) {
    const parsed = productSlugSchema.safeParse(member);
    if (parsed.success) {
      accepted.add(parsed.data);
    } else {
      rejected.push(member);
    }
  }

  return { products: Array.from(accepted).sort(), rejected };
}

/**
 * Products to analyse, read from the registry set. Members that are not usable slugs are
 * logged and left out of the run.
 */
export async function loadRegisteredProducts(redis: Redis): Promise<string[]> {
  const key = buildProductListKey();
  const { products, rejected } = parseProductSlugs(await redis.smembers(key));

  if (rejected.length > 0) {
    logger.warn({ productListKey: key, rejected }, "Ignoring malformed product slugs");
  }
  if (products.length === 0) {
    logger.warn({ productListKey: key }, "No registered products found in Redis");
  }

  return products;
}
