export type SimulatedPaymentDecision =
    | { outcome: 'approved'; cardLast4: string }
    | { outcome: 'declined'; cardLast4: string }
    | { outcome: 'rejected'; reason: string };

const MAX_CARD_DIGITS = 19;

/**
 * Domain Policy: Payment Simulation
 * Stands in for a card processor. Spaces and hyphens are ignored; the remaining
 * characters must all be digits. An even last digit approves, an odd one declines.
 */
export class PaymentSimulationPolicy {
    static evaluate(cardNumber: string): SimulatedPaymentDecision {
        const digits = cardNumber.replace(/[\s-]/g, '');

        if (digits.length === 0) {
            return { outcome: 'rejected', reason: 'Card number is required' };
        }
        if (!/^\d+$/.test(digits)) {
            return { outcome: 'rejected', reason: 'Card number must contain digits only' };
        }
        if (digits.length > MAX_CARD_DIGITS) {
            return { outcome: 'rejected', reason: `Card number cannot be longer than ${MAX_CARD_DIGITS} digits` };
        }

        const cardLast4 = digits.slice(-4);
        const lastDigit = Number(digits.charAt(digits.length - 1));

        return lastDigit % 2 === 0
            ? { outcome: 'approved', cardLast4 }
            : { outcome: 'declined', cardLast4 };
    }
}
