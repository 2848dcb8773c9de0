import { z } from "zod";
import type { SignalIntent } from "../domain/signal.types";
import { SignalValidationError } from "../errors/app.errors";

export const SYMBOL_PATTERN = /^[A-Z0-9]+USDT$/;

const positive = z.number().finite().positive();
const idString = z.union([z.string().min(1), z.number().int()]).transform(String);

const SourceSchema = z.object({
  chatId: idString,
  messageId: idString,
  version: z.number().int().min(1).default(1),
});

const SymbolSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.string().regex(SYMBOL_PATTERN, "symbol must look like BASEUSDT"));

const SideSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(["LONG", "SHORT"]));

/** A single price, a [low, high] pair or { low, high } */
const EntrySchema = z.union([
  positive.transform((price) => ({ low: price, high: price })),
  z.tuple([positive, positive]).transform(([low, high]) => ({ low, high })),
  z.object({ low: positive, high: positive }),
]);

const EntrySignalSchema = z.object({
  kind: z.literal("ENTRY_SIGNAL"),
  signalId: z.string().min(1),
  source: SourceSchema,
  symbol: SymbolSchema,
  side: SideSchema,
  entry: EntrySchema,
  /** Ladder prices in the order they should fill; each lies inside the entry range */
  entryPoints: z.array(positive).min(1).optional(),
  stopLoss: positive.optional(),
  takeProfits: z.array(positive).default([]),
  leverage: positive.optional(),
  quality: z.number().min(0).max(1).default(1),
  confidence: z.number().min(0).max(1).default(1),
  receivedAt: z.number().int().nonnegative().optional(),
});

const ManageActionSchema = z.object({
  kind: z.literal("MANAGE_ACTION"),
  signalId: z.string().min(1),
  source: SourceSchema,
  symbol: SymbolSchema,
  action: z.enum(["reduce_pct", "move_sl_to_be", "take_profit"]),
  pct: z.number().gt(0).max(100).optional(),
  price: positive.optional(),
  receivedAt: z.number().int().nonnegative().optional(),
});

const NonSignalSchema = z.object({
  kind: z.literal("NON_SIGNAL"),
  signalId: z.string().min(1),
  source: SourceSchema,
  reason: z.string().default("not a trade signal"),
  receivedAt: z.number().int().nonnegative().optional(),
});

export const SignalPayloadSchema = z
  .discriminatedUnion("kind", [EntrySignalSchema, ManageActionSchema, NonSignalSchema])
  .superRefine((payload, ctx) => {
    if (payload.kind === "MANAGE_ACTION") {
      if (payload.action === "take_profit" && payload.price === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["price"], message: "take_profit needs a price" });
      }
      return;
    }
    if (payload.kind !== "ENTRY_SIGNAL") return;

    const { low, high } = payload.entry;
    if (low > high) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["entry"], message: "entry low must be <= high" });
      return;
    }
    payload.entryPoints?.forEach((point, index) => {
      if (point < low || point > high) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entryPoints", index],
          message: `entry point must lie inside ${low}-${high}`,
        });
      }
    });
    const long = payload.side === "LONG";
    if (payload.stopLoss !== undefined) {
      const protective = long ? payload.stopLoss < high : payload.stopLoss > low;
      if (!protective) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["stopLoss"],
          message: long ? "long stop-loss must be below entry" : "short stop-loss must be above entry",
        });
      }
    }
    payload.takeProfits.forEach((tp, index) => {
      const profitable = long ? tp > low : tp < high;
      if (!profitable) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["takeProfits", index],
          message: long ? "long take-profit must be above entry" : "short take-profit must be below entry",
        });
      }
    });
  });

export type SignalPayload = z.input<typeof SignalPayloadSchema>;

/**
 * Validate an untrusted payload into a SignalIntent. The first problem found
 * is raised as a SignalValidationError naming the field.
 */
export function validateSignalPayload(payload: unknown, now: number = Date.now()): SignalIntent {
  const parsed = SignalPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
    const message = issue ? issue.message : "invalid signal payload";
    throw new SignalValidationError(field ? `${field}: ${message}` : message, field);
  }

  const data = parsed.data;
  const receivedAt = data.receivedAt ?? now;
  switch (data.kind) {
    case "ENTRY_SIGNAL":
      return {
        kind: "ENTRY_SIGNAL",
        signalId: data.signalId,
        source: data.source,
        symbol: data.symbol,
        side: data.side,
        entry: data.entry,
        entryPoints: data.entryPoints,
        stopLoss: data.stopLoss,
        takeProfits: data.takeProfits,
        leverage: data.leverage,
        quality: data.quality,
        confidence: data.confidence,
        receivedAt,
      };
    case "MANAGE_ACTION":
      return {
        kind: "MANAGE_ACTION",
        signalId: data.signalId,
        source: data.source,
        symbol: data.symbol,
        action: data.action,
        pct: data.pct,
        price: data.price,
        receivedAt,
      };
    case "NON_SIGNAL":
      return {
        kind: "NON_SIGNAL",
        signalId: data.signalId,
        source: data.source,
        reason: data.reason,
        receivedAt,
      };
  }
}
