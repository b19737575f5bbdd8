// Base domain event structure
export interface DomainEvent<T = unknown> {
  id: string;
  type: string;
  data: T;
  timestamp: string;
  version?: number;
  correlationId?: string;
  causationId?: string;
}

// Identity
export type Role = 'user' | 'admin' | 'service';

export interface JWTPayload {
  userId: string;
  email: string;
  roles: Role[];
  iat: number;
  exp: number;
}

export type OwnerKind = 'user' | 'session';

export interface Owner {
  ownerId: string;
  kind: OwnerKind;
  userId?: string;
  roles: Role[];
}

// Catalog (read-only view of the product service)
export interface CatalogProduct {
  productId: string;
  sku: string;
  name: string;
  /** Current price in minor units. */
  price: number;
  active: boolean;
}

// Inventory
export interface ProductStock {
  productId: string;
  available: number;
  reserved: number;
  updatedAt: Date;
}

export type ReservationStatus = 'pending' | 'committed' | 'released';

export interface Reservation {
  reservationId: string;
  checkoutId: string;
  productId: string;
  quantity: number;
  status: ReservationStatus;
  expiresAt: Date;
  createdAt: Date;
}

// Cart
export interface CartItem {
  productId: string;
  name: string;
  quantity: number;
  /** Price captured when the line was last written, in minor units. */
  unitPrice: number;
  addedAt: Date;
}

export interface Cart {
  ownerId: string;
  items: CartItem[];
  version: number;
  settledCheckoutIds: string[];
  updatedAt: Date;
}

export interface CartSnapshot {
  readonly ownerId: string;
  readonly version: number;
  readonly items: readonly Readonly<CartItem>[];
  readonly capturedAt: Date;
}

export interface CartView {
  ownerId: string;
  version: number;
  items: CartItem[];
  totalItems: number;
  subtotal: number;
  updatedAt: Date;
}

// Payments
export interface PaymentDetails {
  token: string;
  cardholderName?: string;
}

export interface ChargeRequest {
  amount: number;
  reference: string;
  paymentDetails: PaymentDetails;
}

export type PaymentOutcome =
  | { status: 'approved'; transactionId: string }
  | { status: 'declined'; reason: string }
  | { status: 'error'; reason: string };

export interface PaymentRecord {
  status: PaymentOutcome['status'];
  provider: string;
  amount: number;
  transactionId?: string;
  reason?: string;
  at: Date;
}

// Checkout
export type CheckoutState =
  | 'initiated'
  | 'validated'
  | 'reserved'
  | 'payment_pending'
  | 'committed'
  | 'rejected';

export type CheckoutFailureCode =
  | 'EMPTY_CART'
  | 'PRODUCT_UNAVAILABLE'
  | 'INVALID_QUANTITY'
  | 'PRICE_CHANGED'
  | 'INSUFFICIENT_STOCK'
  | 'PAYMENT_DECLINED'
  | 'PAYMENT_ERROR'
  | 'TIMEOUT';

export interface CheckoutFailure {
  code: CheckoutFailureCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export interface CheckoutAttempt {
  checkoutId: string;
  idempotencyKey: string;
  ownerId: string;
  orderId: string;
  cart: CartSnapshot;
  state: CheckoutState;
  revision: number;
  run: number;
  reservations: Reservation[];
  total: number;
  payment?: PaymentRecord;
  failure?: CheckoutFailure;
  deadline: Date;
  createdAt: Date;
  updatedAt: Date;
}

// Orders
export interface OrderItem {
  productId: string;
  sku: string;
  name: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface OrderPayment {
  status: 'approved';
  provider: string;
  transactionId: string;
  amount: number;
}

export interface Order {
  orderId: string;
  orderNumber: string;
  checkoutId: string;
  idempotencyKey: string;
  ownerId: string;
  items: OrderItem[];
  total: number;
  payment: OrderPayment;
  createdAt: Date;
}

// Domain events
export interface OrderCreatedEvent {
  orderId: string;
  orderNumber: string;
  ownerId: string;
  items: OrderItem[];
  total: number;
}

export interface CheckoutRejectedEvent {
  checkoutId: string;
  ownerId: string;
  code: CheckoutFailureCode;
  retryable: boolean;
}

export interface InventoryReservedEvent {
  reservationId: string;
  checkoutId: string;
  productId: string;
  quantity: number;
}

export interface InventoryReleasedEvent {
  reservationId: string;
  checkoutId: string;
  productId: string;
  quantity: number;
  reason: 'released' | 'expired';
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: unknown;
  message?: string;
  timestamp: string;
  requestId?: string;
}

export interface PaginatedResponse<T> extends ApiResponse<T[]> {
  pagination: {
    page: number;
    limit: number;
    total: number;
    pages: number;
    hasNext: boolean;
    hasPrev: boolean;
  };
}

export interface PaginationQuery {
  page: number;
  limit: number;
}

// Request types
export interface AddCartItemRequest {
  productId: string;
  quantity: number;
  version?: number;
  replace?: boolean;
}

export interface UpdateCartItemRequest {
  quantity: number;
  version?: number;
}

export interface CheckoutRequest {
  idempotencyKey?: string;
  paymentDetails: PaymentDetails;
}

export interface CheckoutResult {
  orderId: string;
  status: 'committed';
  replayed: boolean;
  order: Order;
}

// Health check types
export interface HealthCheck {
  status: 'healthy' | 'unhealthy' | 'degraded';
  service: string;
  timestamp: string;
  uptime: number;
}
