import { randomInt, timingSafeEqual } from 'crypto';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const TOKEN_PATTERN = /^[A-Za-z0-9]{16,64}$/;

export const JOIN_TOKEN_LENGTH = 32;

export function generateJoinToken(length: number = JOIN_TOKEN_LENGTH): string {
    let token = '';
    for (let i = 0; i < length; i++) {
        token += ALPHABET[randomInt(ALPHABET.length)];
    }
    return token;
}

export function tokenExpiryFrom(now: Date, ttlHours: number): Date {
    return new Date(now.getTime() + ttlHours * 60 * 60 * 1000);
}

export function isWellFormedToken(token: string): boolean {
    return TOKEN_PATTERN.test(token);
}

// A missing expiry counts as expired
export function isTokenExpired(expiry: Date | null, now: Date): boolean {
    return expiry === null || now.getTime() > expiry.getTime();
}

export function tokensMatch(expected: string, presented: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(presented);
    return a.length === b.length && timingSafeEqual(a, b);
}
