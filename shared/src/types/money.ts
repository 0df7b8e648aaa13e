/**
 * A monetary amount serialized as a decimal string, e.g. "100.00". Responses
 * always carry two fraction digits. Request schemas coerce a bare JSON number
 * such as 60 to "60" before the pattern check, so clients should still send strings.
 */
export type Money = string;

/**
 * Payment status derived from an invoice's amount and the payments applied to it.
 */
export type PaymentStatus = 'unpaid' | 'partial' | 'paid';
