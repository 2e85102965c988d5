import mongoose, { Schema, type Model } from "mongoose";

export interface ReviewDoc extends mongoose.Document {
  listingId: mongoose.Types.ObjectId;
  bookingId?: mongoose.Types.ObjectId | null;
  reviewerId: mongoose.Types.ObjectId;
  rating: number; // 1..5
  comment: string;
  createdAt: Date;
  updatedAt: Date;
}

const ReviewSchema = new Schema<ReviewDoc>(
  {
    listingId: { type: Schema.Types.ObjectId, ref: "Listing", required: true, index: true },
    bookingId: { type: Schema.Types.ObjectId, ref: "Booking", default: null },
    reviewerId: { type: Schema.Types.ObjectId, ref: "User", required: true },
    rating: {
      type: Number,
      required: true,
      min: 1,
      max: 5,
      validate: { validator: Number.isInteger, message: "rating must be a whole number of stars" },
    },
    comment: { type: String, required: true, trim: true, maxlength: 4000 },
  },
  { timestamps: true }
);

// one review per guest per listing; at most one per booking
ReviewSchema.index({ listingId: 1, reviewerId: 1 }, { unique: true });
ReviewSchema.index(
  { bookingId: 1 },
  { unique: true, partialFilterExpression: { bookingId: { $type: "objectId" } } }
);

export const Review: Model<ReviewDoc> =
  mongoose.models.Review || mongoose.model<ReviewDoc>("Review", ReviewSchema);
