import type {
  Cart,
  CartItem,
  CatalogProduct,
  CheckoutAttempt,
  CheckoutFailure,
  Order,
  PaymentRecord,
  ProductStock,
  Reservation,
} from '@storefront/types';

/**
 * Stock rows and the reservations held against them. `reserve`, `release`
 * and `commit` each move counters and reservation status as one atomic step.
 */
export interface InventoryRepository {
  findStock(productId: string): Promise<ProductStock | null>;
  /** Sets the sellable quantity, creating the row when missing. Reserved units are untouched. */
  setAvailable(productId: string, available: number): Promise<ProductStock>;
  /** Returns null when the row is missing or holds fewer than `quantity` available units. */
  reserve(reservation: Reservation): Promise<ProductStock | null>;
  /** Returns the reservation only when it moved from pending to released. */
  release(reservationId: string): Promise<Reservation | null>;
  /** Returns the reservation only when it moved from pending to committed. */
  commit(reservationId: string): Promise<Reservation | null>;
  findReservation(reservationId: string): Promise<Reservation | null>;
  findReservationsByCheckout(checkoutId: string): Promise<Reservation[]>;
  findExpiredReservations(now: Date, productId?: string): Promise<Reservation[]>;
}

export interface CartChanges {
  items: CartItem[];
  settledCheckoutIds?: string[];
}

export interface CartRepository {
  findByOwner(ownerId: string): Promise<Cart | null>;
  /**
   * Writes the cart only if its stored version equals `expectedVersion`
   * (version 0 means "no cart yet") and bumps the version. Returns null on a
   * version mismatch.
   */
  compareAndSet(ownerId: string, expectedVersion: number, changes: CartChanges): Promise<Cart | null>;
}

export type CheckoutAttemptChanges = Partial<
  Pick<CheckoutAttempt, 'state' | 'run' | 'cart' | 'reservations' | 'total' | 'deadline'>
> & {
  /** null removes the recorded value. */
  payment?: PaymentRecord | null;
  failure?: CheckoutFailure | null;
};

export interface CheckoutAttemptRepository {
  /** Returns false when the checkout id or idempotency key already exists. */
  create(attempt: CheckoutAttempt): Promise<boolean>;
  findById(checkoutId: string): Promise<CheckoutAttempt | null>;
  findByIdempotencyKey(idempotencyKey: string): Promise<CheckoutAttempt | null>;
  /** Applies the changes only if the stored revision matches, then bumps it. */
  update(
    checkoutId: string,
    expectedRevision: number,
    changes: CheckoutAttemptChanges
  ): Promise<CheckoutAttempt | null>;
  /** Attempts holding an approved payment that have not reached `committed`. */
  findApprovedUncommitted(): Promise<CheckoutAttempt[]>;
  /** Non-terminal attempts past their deadline without an approved payment. */
  findExpiredInFlight(now: Date): Promise<CheckoutAttempt[]>;
}

export interface OrderPage {
  limit: number;
  skip: number;
}

export interface OrderRepository {
  /** Returns false when the order id, order number or idempotency key already exists. */
  insert(order: Order): Promise<boolean>;
  findById(orderId: string): Promise<Order | null>;
  findByIdempotencyKey(idempotencyKey: string): Promise<Order | null>;
  /** Newest first. */
  findByOwner(ownerId: string, page: OrderPage): Promise<Order[]>;
  countByOwner(ownerId: string): Promise<number>;
}

export interface CatalogRepository {
  findProduct(productId: string): Promise<CatalogProduct | null>;
}

export interface Repositories {
  inventory: InventoryRepository;
  carts: CartRepository;
  attempts: CheckoutAttemptRepository;
  orders: OrderRepository;
  catalog: CatalogRepository;
}
