import mongoose, { type ClientSession, Types } from "mongoose";
import Customer, { type ICustomer } from "../models/Customer";
import Snack, { type ISnack } from "../models/Snack";
import Cart, { type ICart } from "../models/Cart";
import CartItem, { type ICartItem } from "../models/CartItem";
import Order, { type IOrder } from "../models/Order";
import OrderItem, { type IOrderItem } from "../models/OrderItem";
import Payment, { type IPayment } from "../models/Payment";
import Feedback, { type IFeedback } from "../models/Feedback";
import type {
  CartItemRecord,
  CartRecord,
  CustomerRecord,
  FeedbackRecord,
  NewCustomer,
  NewFeedback,
  NewOrder,
  NewOrderItem,
  NewPayment,
  NewSnack,
  OrderItemRecord,
  OrderRecord,
  OrderStatus,
  PaymentRecord,
  PaymentStatus,
  SnackPatch,
  SnackRecord,
} from "../types";
import type { OrderFilter, PaymentFilter, ShopStore } from "./shopStore";

const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

const isObjectId = (id: string): boolean => OBJECT_ID_PATTERN.test(id);

const toObjectIds = (ids: string[]): Types.ObjectId[] =>
  ids.filter(isObjectId).map((id) => new Types.ObjectId(id));

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

/**
 * Recovers from a unique-index race by running `retry`. Inside a transaction
 * the server has already aborted it, so the error is rethrown and
 * `connection.transaction` retries the whole unit of work instead.
 */
export const retryAfterDuplicateKey = async <T>(
  error: unknown,
  inTransaction: boolean,
  retry: () => Promise<T>
): Promise<T> => {
  if (inTransaction || !isDuplicateKeyError(error)) {
    throw error;
  }
  return retry();
};

const toCustomer = (doc: ICustomer): CustomerRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  email: doc.email,
  mobile: doc.mobile,
  passwordHash: doc.password,
  createdAt: doc.createdAt,
});

const toSnack = (doc: ISnack): SnackRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  price: doc.price,
  stock: doc.stock,
  stockTracked: doc.stockTracked,
  image: doc.image ?? null,
  createdAt: doc.createdAt,
});

const toCart = (doc: ICart): CartRecord => ({
  id: doc._id.toString(),
  customerId: doc.customer.toString(),
  createdAt: doc.createdAt,
});

const toCartItem = (doc: ICartItem): CartItemRecord => ({
  id: doc._id.toString(),
  cartId: doc.cart.toString(),
  snackId: doc.snack.toString(),
  quantity: doc.quantity,
});

const toOrder = (doc: IOrder): OrderRecord => ({
  id: doc._id.toString(),
  customerId: doc.customer ? doc.customer.toString() : null,
  orderTime: doc.orderTime,
  status: doc.status,
  price: doc.price,
});

const toOrderItem = (doc: IOrderItem): OrderItemRecord => ({
  id: doc._id.toString(),
  orderId: doc.order.toString(),
  snackId: doc.snack.toString(),
  snackName: doc.snackName,
  quantity: doc.quantity,
});

const toPayment = (doc: IPayment): PaymentRecord => ({
  id: doc._id.toString(),
  orderId: doc.order.toString(),
  mode: doc.mode,
  status: doc.status,
  paymentTime: doc.paymentTime,
});

const toFeedback = (doc: IFeedback): FeedbackRecord => ({
  id: doc._id.toString(),
  customerId: doc.customer.toString(),
  rating: doc.rating ?? null,
  content: doc.content,
  feedbackTime: doc.feedbackTime,
});

/**
 * ShopStore over the Mongoose models. An instance created by `transaction`
 * carries the session and passes it to every query it runs.
 */
export class MongoShopStore implements ShopStore {
  constructor(private readonly session: ClientSession | null = null) {}

  async transaction<T>(work: (tx: ShopStore) => Promise<T>): Promise<T> {
    if (this.session) {
      return work(this);
    }
    // connection.transaction() retries the callback on transient errors
    return mongoose.connection.transaction((session) =>
      work(new MongoShopStore(session))
    );
  }

  // ---- customers ----

  async createCustomer(input: NewCustomer): Promise<CustomerRecord> {
    const doc = await new Customer({
      name: input.name,
      email: input.email,
      mobile: input.mobile,
      password: input.passwordHash,
    }).save({ session: this.session });
    return toCustomer(doc);
  }

  async findCustomerById(id: string): Promise<CustomerRecord | null> {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Customer.findById(id).session(this.session);
    return doc ? toCustomer(doc) : null;
  }

  async findCustomerByLogin(identifier: string): Promise<CustomerRecord | null> {
    const doc = await Customer.findOne({
      $or: [{ email: identifier.toLowerCase() }, { mobile: identifier }],
    }).session(this.session);
    return doc ? toCustomer(doc) : null;
  }

  async findCustomerByEmailOrMobile(
    email: string,
    mobile: string
  ): Promise<CustomerRecord | null> {
    const doc = await Customer.findOne({
      $or: [{ email: email.toLowerCase() }, { mobile }],
    }).session(this.session);
    return doc ? toCustomer(doc) : null;
  }

  async deleteCustomer(id: string): Promise<boolean> {
    if (!isObjectId(id)) {
      return false;
    }
    const customerId = new Types.ObjectId(id);
    const carts = await Cart.find({ customer: customerId }).session(this.session);
    const cartIds = carts.map((cart) => cart._id);

    await CartItem.deleteMany({ cart: { $in: cartIds } }, { session: this.session ?? undefined });
    await Cart.deleteMany({ customer: customerId }, { session: this.session ?? undefined });
    await Feedback.deleteMany({ customer: customerId }, { session: this.session ?? undefined });
    await Order.updateMany(
      { customer: customerId },
      { $set: { customer: null } },
      { session: this.session ?? undefined }
    );
    const result = await Customer.deleteOne({ _id: customerId }, { session: this.session ?? undefined });
    return result.deletedCount > 0;
  }

  // ---- snacks ----

  async listSnacks(): Promise<SnackRecord[]> {
    const docs = await Snack.find().sort({ createdAt: 1, _id: 1 }).session(this.session);
    return docs.map(toSnack);
  }

  async countSnacks(): Promise<number> {
    return await Snack.countDocuments().session(this.session);
  }

  async findSnackById(id: string): Promise<SnackRecord | null> {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Snack.findById(id).session(this.session);
    return doc ? toSnack(doc) : null;
  }

  async findSnacksByIds(ids: string[]): Promise<SnackRecord[]> {
    const docs = await Snack.find({ _id: { $in: toObjectIds(ids) } }).session(this.session);
    return docs.map(toSnack);
  }

  async createSnack(input: NewSnack): Promise<SnackRecord> {
    const doc = await new Snack(input).save({ session: this.session });
    return toSnack(doc);
  }

  async createSnackIfMissing(input: NewSnack): Promise<boolean> {
    const result = await Snack.updateOne(
      { name: input.name },
      { $setOnInsert: input },
      { upsert: true, session: this.session ?? undefined }
    );
    return result.upsertedCount === 1;
  }

  async updateSnack(id: string, patch: SnackPatch): Promise<SnackRecord | null> {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Snack.findByIdAndUpdate(
      id,
      { $set: patch },
      { new: true, runValidators: true }
    ).session(this.session);
    return doc ? toSnack(doc) : null;
  }

  async deleteSnack(id: string): Promise<boolean> {
    if (!isObjectId(id)) {
      return false;
    }
    const result = await Snack.deleteOne({ _id: id }, { session: this.session ?? undefined });
    return result.deletedCount > 0;
  }

  async decrementStock(snackId: string, quantity: number): Promise<boolean> {
    if (!isObjectId(snackId)) {
      return false;
    }
    // The $gte filter makes the check and the write one atomic step
    const result = await Snack.updateOne(
      { _id: snackId, stock: { $gte: quantity } },
      { $inc: { stock: -quantity } },
      { session: this.session ?? undefined }
    );
    return result.modifiedCount === 1;
  }

  // ---- carts ----

  async listCartsForCustomer(customerId: string): Promise<CartRecord[]> {
    if (!isObjectId(customerId)) {
      return [];
    }
    const docs = await Cart.find({ customer: customerId })
      .sort({ createdAt: 1, _id: 1 })
      .session(this.session);
    return docs.map(toCart);
  }

  async listCustomerIdsWithDuplicateCarts(): Promise<string[]> {
    const groups = await Cart.aggregate<{ _id: Types.ObjectId; count: number }>([
      { $group: { _id: "$customer", count: { $sum: 1 } } },
      { $match: { count: { $gt: 1 } } },
    ]).session(this.session);
    return groups.map((group) => group._id.toString());
  }

  async createCart(customerId: string): Promise<CartRecord> {
    try {
      const doc = await new Cart({ customer: customerId }).save({ session: this.session });
      return toCart(doc);
    } catch (error) {
      // Lost a race against another request creating the same cart
      return retryAfterDuplicateKey(error, this.session !== null, async () => {
        const existing = await Cart.findOne({ customer: customerId });
        if (!existing) {
          throw error;
        }
        return toCart(existing);
      });
    }
  }

  async deleteCarts(cartIds: string[]): Promise<void> {
    const ids = toObjectIds(cartIds);
    if (ids.length === 0) {
      return;
    }
    await CartItem.deleteMany({ cart: { $in: ids } }, { session: this.session ?? undefined });
    await Cart.deleteMany({ _id: { $in: ids } }, { session: this.session ?? undefined });
  }

  async listCartItems(cartIds: string[]): Promise<CartItemRecord[]> {
    const docs = await CartItem.find({ cart: { $in: toObjectIds(cartIds) } })
      .sort({ createdAt: 1, _id: 1 })
      .session(this.session);
    return docs.map(toCartItem);
  }

  async findCartItem(cartId: string, cartItemId: string): Promise<CartItemRecord | null> {
    if (!isObjectId(cartId) || !isObjectId(cartItemId)) {
      return null;
    }
    const doc = await CartItem.findOne({ _id: cartItemId, cart: cartId }).session(this.session);
    return doc ? toCartItem(doc) : null;
  }

  async incrementCartItem(
    cartId: string,
    snackId: string,
    quantity: number
  ): Promise<CartItemRecord> {
    const upsert = () =>
      CartItem.findOneAndUpdate(
        { cart: cartId, snack: snackId },
        { $inc: { quantity } },
        { upsert: true, new: true, setDefaultsOnInsert: false }
      ).session(this.session);

    // Two upserts on a missing line: the loser retries as a plain update
    const doc = await upsert().catch((error: unknown) =>
      retryAfterDuplicateKey(error, this.session !== null, upsert)
    );
    if (!doc) {
      throw new Error(`Cart item upsert for cart ${cartId} returned nothing`);
    }
    return toCartItem(doc);
  }

  async adjustCartItemQuantity(
    cartItemId: string,
    delta: number,
    max: number | null
  ): Promise<CartItemRecord | null> {
    if (!isObjectId(cartItemId)) {
      return null;
    }
    // Bounds go in the filter so the check and the $inc are one atomic step
    const quantity = max === null ? { $gte: 1 - delta } : { $gte: 1 - delta, $lte: max - delta };
    const doc = await CartItem.findOneAndUpdate(
      { _id: cartItemId, quantity },
      { $inc: { quantity: delta } },
      { new: true }
    ).session(this.session);
    return doc ? toCartItem(doc) : null;
  }

  async deleteCartItem(cartItemId: string): Promise<void> {
    if (!isObjectId(cartItemId)) {
      return;
    }
    await CartItem.deleteOne({ _id: cartItemId }, { session: this.session ?? undefined });
  }

  async clearCart(cartId: string): Promise<void> {
    if (!isObjectId(cartId)) {
      return;
    }
    await CartItem.deleteMany({ cart: cartId }, { session: this.session ?? undefined });
  }

  // ---- orders ----

  async createOrder(input: NewOrder): Promise<OrderRecord> {
    const doc = await new Order({
      customer: input.customerId,
      orderTime: input.orderTime,
      status: input.status,
      price: input.price,
    }).save({ session: this.session });
    return toOrder(doc);
  }

  async findOrderById(id: string): Promise<OrderRecord | null> {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Order.findById(id).session(this.session);
    return doc ? toOrder(doc) : null;
  }

  async listOrders(filter: OrderFilter): Promise<OrderRecord[]> {
    const query: mongoose.FilterQuery<IOrder> = {};
    if (filter.customerId !== undefined) {
      if (!isObjectId(filter.customerId)) {
        return [];
      }
      query.customer = new Types.ObjectId(filter.customerId);
    }
    if (filter.since) {
      query.orderTime = { $gte: filter.since };
    }
    if (filter.status) {
      query.status = filter.status;
    }

    let find = Order.find(query).sort({ orderTime: -1, _id: -1 });
    if (filter.limit !== undefined) {
      find = find.limit(filter.limit);
    }
    const docs = await find.session(this.session);
    return docs.map(toOrder);
  }

  async setOrderStatus(id: string, status: OrderStatus): Promise<OrderRecord | null> {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Order.findByIdAndUpdate(
      id,
      { $set: { status } },
      { new: true, runValidators: true }
    ).session(this.session);
    return doc ? toOrder(doc) : null;
  }

  async createOrderItems(items: NewOrderItem[]): Promise<OrderItemRecord[]> {
    const created: OrderItemRecord[] = [];
    for (const item of items) {
      const doc = await new OrderItem({
        order: item.orderId,
        snack: item.snackId,
        snackName: item.snackName,
        quantity: item.quantity,
      }).save({ session: this.session });
      created.push(toOrderItem(doc));
    }
    return created;
  }

  async listOrderItems(orderId: string): Promise<OrderItemRecord[]> {
    if (!isObjectId(orderId)) {
      return [];
    }
    const docs = await OrderItem.find({ order: orderId }).sort({ _id: 1 }).session(this.session);
    return docs.map(toOrderItem);
  }

  // ---- payments ----

  async createPayment(input: NewPayment): Promise<PaymentRecord> {
    const doc = await new Payment({
      order: input.orderId,
      mode: input.mode,
      status: input.status,
      paymentTime: input.paymentTime,
    }).save({ session: this.session });
    return toPayment(doc);
  }

  async findPaymentById(id: string): Promise<PaymentRecord | null> {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Payment.findById(id).session(this.session);
    return doc ? toPayment(doc) : null;
  }

  async listPaymentsForOrder(orderId: string): Promise<PaymentRecord[]> {
    if (!isObjectId(orderId)) {
      return [];
    }
    const docs = await Payment.find({ order: orderId })
      .sort({ paymentTime: -1, _id: -1 })
      .session(this.session);
    return docs.map(toPayment);
  }

  async listPayments(filter: PaymentFilter): Promise<PaymentRecord[]> {
    const query: mongoose.FilterQuery<IPayment> = {};
    if (filter.since) {
      query.paymentTime = { $gte: filter.since };
    }
    if (filter.status) {
      query.status = filter.status;
    }
    if (filter.mode) {
      query.mode = filter.mode;
    }
    const docs = await Payment.find(query)
      .sort({ paymentTime: -1, _id: -1 })
      .session(this.session);
    return docs.map(toPayment);
  }

  async setPaymentStatus(id: string, status: PaymentStatus): Promise<PaymentRecord | null> {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Payment.findByIdAndUpdate(
      id,
      { $set: { status } },
      { new: true, runValidators: true }
    ).session(this.session);
    return doc ? toPayment(doc) : null;
  }

  // ---- feedback ----

  async createFeedback(input: NewFeedback): Promise<FeedbackRecord> {
    const doc = await new Feedback({
      customer: input.customerId,
      rating: input.rating,
      content: input.content,
      feedbackTime: input.feedbackTime,
    }).save({ session: this.session });
    return toFeedback(doc);
  }

  async listFeedback(): Promise<FeedbackRecord[]> {
    const docs = await Feedback.find().sort({ feedbackTime: -1, _id: -1 }).session(this.session);
    return docs.map(toFeedback);
  }

  async deleteFeedback(id: string): Promise<boolean> {
    if (!isObjectId(id)) {
      return false;
    }
    const result = await Feedback.deleteOne({ _id: id }, { session: this.session ?? undefined });
    return result.deletedCount > 0;
  }
}
