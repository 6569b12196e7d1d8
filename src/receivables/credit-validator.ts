// src/receivables/credit-validator.ts
import { Decimal, ZERO, formatAmount, maxOf } from '../common/money';

/** Pedidos que comprometen crédito. */
export const COMMITTED_ORDER_STATUSES = [
  'confirmed',
  'ready',
  'shipped',
  'delivered',
] as const;

export interface CreditTerms {
  creditLimit: Decimal;
  blockOnCreditExceeded: boolean;
}

export interface CreditValidationResult {
  valid: boolean;
  currentDebt: Decimal;
  creditLimit: Decimal;
  availableCredit: Decimal;
  newDebtAfterOrder: Decimal;
  message: string;
}

/**
 * Deuda vigente sin el pedido que se está revalidando (nunca negativa).
 */
export function debtExcludingOrder(
  committedTotal: Decimal,
  excludedOrderTotal: Decimal | null,
): Decimal {
  return excludedOrderTotal
    ? maxOf(ZERO, committedTotal.minus(excludedOrderTotal))
    : committedTotal;
}

export function validateCredit(
  terms: CreditTerms | null,
  currentDebt: Decimal,
  orderTotal: Decimal,
): CreditValidationResult {
  const newDebtAfterOrder = currentDebt.plus(orderTotal);
  if (!terms || !terms.blockOnCreditExceeded) {
    const creditLimit = terms ? terms.creditLimit : ZERO;
    return {
      valid: true,
      currentDebt,
      creditLimit,
      availableCredit: terms ? creditLimit.minus(currentDebt) : ZERO,
      newDebtAfterOrder,
      message: 'Control de crédito desactivado para este cliente',
    };
  }

  const { creditLimit } = terms;
  const availableCredit = creditLimit.minus(currentDebt);
  if (newDebtAfterOrder.gt(creditLimit)) {
    return {
      valid: false,
      currentDebt,
      creditLimit,
      availableCredit,
      newDebtAfterOrder,
      message: `Límite de crédito excedido: deuda ${formatAmount(newDebtAfterOrder)} > límite ${formatAmount(creditLimit)}`,
    };
  }
  return {
    valid: true,
    currentDebt,
    creditLimit,
    availableCredit,
    newDebtAfterOrder,
    message: `Crédito disponible: ${formatAmount(availableCredit.minus(orderTotal))}`,
  };
}
