/**
 * Input schemas for the engine's entry points.
 */

import { amountSchema, indexSchema, z } from "../lib/validation/index.js";

export const indexListSchema = z.array(indexSchema);

export const feeExponentSchema = z.number().int().min(1).max(3);

export const pairParamsSchema = z.object({
	groupIndex: indexSchema,
	feePerBlock: amountSchema,
	feeExponent: feeExponentSchema,
	maxOi: amountSchema,
});

export const groupParamsSchema = z.object({
	feePerBlock: amountSchema,
	maxOi: amountSchema,
	feeExponent: feeExponentSchema,
});

const traderSchema = z.string().trim().min(1);

export const tradeActionSchema = z.object({
	trader: traderSchema,
	pairIndex: indexSchema,
	index: indexSchema,
	positionSize: amountSchema,
	open: z.boolean(),
	long: z.boolean(),
});

export const tradeFeeInputSchema = z.object({
	trader: traderSchema,
	pairIndex: indexSchema,
	index: indexSchema,
	long: z.boolean(),
	collateral: amountSchema,
	leverage: amountSchema,
});

export const liquidationPriceInputSchema = tradeFeeInputSchema.extend({
	collateral: z.bigint().positive(),
	leverage: z.bigint().positive(),
	openPrice: amountSchema,
	rolloverFee: amountSchema,
});
