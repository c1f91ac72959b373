// Module product types

import {Book, Discount} from "../domain";
import {Maybe} from "purify-ts";

export type DomainErrorType = 'not_found' | 'invalid_state' | 'invalid_discount' | 'invalid_order';

export type DomainError = {
    readonly type: DomainErrorType;
    readonly message: string;
};

/**
 * Raw discount fields as supplied by the record source, before validation.
 * An empty coupon code or author is treated as absent.
 */
export type DiscountRecord = {
    readonly id: number;
    readonly validFrom: Date;
    readonly validUntil: Date;
    readonly percentOff: number;
    readonly usesRemaining: number;
    readonly couponCode?: string | null;
    readonly author?: string | null;
};

export type LineCharge = {
    readonly book: Book;
    readonly quantity: number;
    readonly subtotal: number;
    readonly total: number;
    readonly appliedDiscountId: Maybe<number>;
};

export type DiscountedOrder = {
    readonly lines: LineCharge[];
    readonly lineTotal: number;
    readonly orderDiscountIds: number[];
    readonly runningTotal: number;
    readonly remainingDiscounts: Discount[];
};

export type ShippingStatus = 'charged' | 'waived' | 'unavailable';

export type ShippingCharge = {
    readonly status: ShippingStatus;
    readonly quotedCost: number;
    readonly cost: number;
};

export type PricedOrder = {
    readonly username: string;
    readonly lines: LineCharge[];
    readonly orderDiscountIds: number[];
    readonly preShippingTotal: number;
    readonly shipping: ShippingCharge;
    readonly total: number;
};

export type PricingPolicy = {
    readonly storeLocation: string;
    readonly freeShippingThreshold: number;
};

export type DiscountAssignment = {
    readonly username: string;
    readonly discount: Discount;
};

export type AssignmentResult = {
    readonly discountId: number;
    readonly assignedTo: string[];
};

export type AnalyticsEvent = {
    readonly event: string;
    readonly username: string;
    readonly total: number;
    readonly discountIds: number[];
    readonly shippingStatus: ShippingStatus;
};

export type ShippingUnavailableAlert = {
    readonly type: 'shipping_unavailable';
    readonly username: string;
    readonly origin: string;
    readonly destination: string;
};
