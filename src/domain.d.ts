// Domain types shared across the application

export type Book = {
  readonly title: string;
  readonly author: string;
  readonly unitPrice: number;
};

type DiscountTerms = {
  readonly id: number;
  readonly validFrom: Date;
  readonly validUntil: Date;
  readonly percentOff: number;
  readonly usesRemaining: number;
};

export type GeneralDiscount = DiscountTerms & {
  readonly kind: 'general';
};

export type AuthorScopedDiscount = DiscountTerms & {
  readonly kind: 'author';
  readonly author: string;
};

export type CouponDiscount = DiscountTerms & {
  readonly kind: 'coupon';
  readonly couponCode: string;
};

export type Discount = GeneralDiscount | AuthorScopedDiscount | CouponDiscount;

export type DiscountKind = Discount['kind'];

export type OrderLine = {
  readonly book: Book;
  readonly quantity: number;
};

export type Order = {
  readonly customerUsername: string;
  readonly lines: OrderLine[];
  readonly placedAt: Date;
};

export type Customer = {
  readonly username: string;
  readonly location: string;
  readonly signupDate: Date;
  readonly activeDiscounts: Discount[];
  readonly currentOrder: Order | null;
};

export type BookSelection = {
  readonly title: string;
  readonly quantity: number;
};
