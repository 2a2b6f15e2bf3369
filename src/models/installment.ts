import { z } from "zod";
import type { Decoder } from "../decoding";

/** One row of an installment simulation. */
export interface InstallmentOption {
  /** Number of installments. */
  readonly installments: number;
  /** Amount of each installment. */
  readonly amount: number;
  /** Total paid across all installments. */
  readonly total: number;
  /** Implied interest rate, in percent. */
  readonly interestRate: number;
}

const installmentRow = z
  .object({
    installments: z.number().int(),
    amount: z.number(),
    total: z.number(),
    interest_rate: z.number(),
  })
  .transform(
    (row): InstallmentOption => ({
      installments: row.installments,
      amount: row.amount,
      total: row.total,
      interestRate: row.interest_rate,
    }),
  );

export const installmentOptionsSchema: Decoder<readonly InstallmentOption[]> = z
  .object({ installments: z.array(installmentRow) })
  .transform((body) => body.installments);
