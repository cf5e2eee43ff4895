import type { ShopStore } from "../store/shopStore";
import type { Clock, CustomerPrincipal, FeedbackRecord, Principal } from "../types";
import { NotFoundError, ValidationFailure } from "../utils/errors";
import { assertOwner } from "../utils/principal";

export interface FeedbackInput {
  rating?: unknown;
  content?: unknown;
}

// Ratings outside 1-5 are stored as "no rating"
export const normalizeRating = (value: unknown): number | null => {
  const rating =
    typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
  return Number.isInteger(rating) && rating >= 1 && rating <= 5 ? rating : null;
};

// Counts code points so an emoji is never cut in half
export const truncateCharacters = (text: string, max: number): string =>
  Array.from(text).slice(0, max).join("");

export class FeedbackService {
  constructor(
    private readonly store: ShopStore,
    private readonly maxLength: number,
    private readonly clock: Clock
  ) {}

  async submitFeedback(
    customer: CustomerPrincipal,
    input: FeedbackInput
  ): Promise<FeedbackRecord> {
    const content = typeof input.content === "string" ? input.content.trim() : "";
    const rating = normalizeRating(input.rating);
    if (!content && rating === null) {
      throw new ValidationFailure("Give a rating or write a comment.");
    }
    return this.store.createFeedback({
      customerId: customer.customerId,
      rating,
      content: truncateCharacters(content, this.maxLength),
      feedbackTime: this.clock(),
    });
  }

  async listFeedback(principal: Principal | undefined): Promise<FeedbackRecord[]> {
    assertOwner(principal);
    return this.store.listFeedback();
  }

  async deleteFeedback(principal: Principal | undefined, feedbackId: string): Promise<void> {
    assertOwner(principal);
    if (!(await this.store.deleteFeedback(feedbackId))) {
      throw new NotFoundError("Feedback not found");
    }
  }
}
