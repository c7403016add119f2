import { randomInt } from 'node:crypto';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const SUFFIX_LENGTH = 5;
const PNR_PATTERN = /^PNR\d{4,}[A-Z0-9]{5}$/;

/**
 * Domain Policy: PNR
 * A PNR is `PNR`, the booking id padded to four digits, and five random characters.
 * The id part keeps PNRs unique: two PNRs of equal length carry ids of equal width.
 */
export class PnrPolicy {
    static generate(bookingId: number, pickIndex: (max: number) => number = randomInt): string {
        if (!Number.isInteger(bookingId) || bookingId <= 0) {
            throw new Error('Booking id must be a positive integer');
        }

        let suffix = '';
        for (let i = 0; i < SUFFIX_LENGTH; i++) {
            suffix += ALPHABET.charAt(pickIndex(ALPHABET.length));
        }

        return `PNR${bookingId.toString().padStart(4, '0')}${suffix}`;
    }

    static isWellFormed(pnr: string): boolean {
        return PNR_PATTERN.test(pnr);
    }

    static normalize(pnr: string): string {
        return pnr.trim().toUpperCase();
    }
}
