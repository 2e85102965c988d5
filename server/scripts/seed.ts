// server/scripts/seed.ts
/**
 * Loads fixtures/seed.json into Mongo. Fixtures are validated up front; any failure
 * afterwards aborts the run.
 *
 *   npm run seed            # add to whatever is there
 *   npm run seed -- --clear # wipe bookings, payments, reviews, locks and listings first
 */
import "dotenv/config";
import { readFileSync } from "node:fs";

import mongoose from "mongoose";
import { z } from "zod";

import { closeMongo, connectMongo } from "../src/config/db.js";
import { logger } from "../src/config/logger.js";
import { PROPERTY_TYPES } from "../src/domain/enums.js";
import { toCents } from "../src/domain/money.js";
import { Booking } from "../src/modules/bookings/model.js";
import { Listing } from "../src/modules/listings/model.js";
import { BookingLock } from "../src/modules/locks/model.js";
import { Payment } from "../src/modules/payments/model.js";
import { Review } from "../src/modules/reviews/model.js";
import { mongoServices } from "../src/services.js";
import { addDays, dayBucket } from "../src/utils/dates.js";

const ObjectIdString = z.string().regex(/^[0-9a-f]{24}$/i);

const FixturesSchema = z
  .object({
    hosts: z.array(ObjectIdString).min(1),
    guests: z.array(ObjectIdString).min(1),
    listings: z.array(
      z.object({
        id: ObjectIdString,
        hostIndex: z.number().int().min(0),
        title: z.string().min(1),
        description: z.string().min(1),
        location: z.string().min(1),
        propertyType: z.enum(PROPERTY_TYPES),
        pricePerNight: z.string().regex(/^\d+\.\d{2}$/),
        maxGuests: z.number().int().min(1).max(50),
        bedrooms: z.number().int().min(1),
        bathrooms: z.number().int().min(1),
        amenities: z.array(z.string()),
        available: z.boolean(),
      })
    ),
    bookings: z.array(
      z.object({
        listingIndex: z.number().int().min(0),
        guestIndex: z.number().int().min(0),
        startInDays: z.number().int().min(2),
        nights: z.number().int().min(1),
        guests: z.number().int().min(1),
        confirm: z.boolean(),
      })
    ),
    reviews: z.array(
      z.object({
        listingIndex: z.number().int().min(0),
        guestIndex: z.number().int().min(0),
        rating: z.number().int().min(1).max(5),
        comment: z.string().min(1),
      })
    ),
  })
  .superRefine((f, ctx) => {
    const inRange = (i: number, len: number, path: (string | number)[]) => {
      if (i >= len) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `index ${i} out of range`, path });
    };
    f.listings.forEach((l, i) => inRange(l.hostIndex, f.hosts.length, ["listings", i, "hostIndex"]));
    f.bookings.forEach((b, i) => {
      inRange(b.listingIndex, f.listings.length, ["bookings", i, "listingIndex"]);
      inRange(b.guestIndex, f.guests.length, ["bookings", i, "guestIndex"]);
    });
    f.reviews.forEach((r, i) => {
      inRange(r.listingIndex, f.listings.length, ["reviews", i, "listingIndex"]);
      inRange(r.guestIndex, f.guests.length, ["reviews", i, "guestIndex"]);
    });
  });

type Fixtures = z.infer<typeof FixturesSchema>;

function loadFixtures(): Fixtures {
  const raw: unknown = JSON.parse(readFileSync(new URL("./fixtures/seed.json", import.meta.url), "utf8"));
  return FixturesSchema.parse(raw);
}

/** Indexes were range-checked by the schema. */
function at<T>(items: T[], i: number): T {
  const item = items[i];
  if (item === undefined) throw new Error(`fixture index ${i} out of range`);
  return item;
}

async function main() {
  const fx = loadFixtures();
  const clear = process.argv.includes("--clear");

  await connectMongo();

  if (clear) {
    logger.warn("seed.clearing");
    await Promise.all([
      Review.deleteMany({}),
      Payment.deleteMany({}),
      Booking.deleteMany({}),
      BookingLock.deleteMany({}),
      Listing.deleteMany({}),
    ]);
  }

  for (const l of fx.listings) {
    await Listing.create({
      _id: new mongoose.Types.ObjectId(l.id),
      hostId: new mongoose.Types.ObjectId(at(fx.hosts, l.hostIndex)),
      title: l.title,
      description: l.description,
      location: l.location,
      propertyType: l.propertyType,
      pricePerNightCents: toCents(l.pricePerNight),
      maxGuests: l.maxGuests,
      bedrooms: l.bedrooms,
      bathrooms: l.bathrooms,
      amenities: l.amenities,
      available: l.available,
    });
  }

  // bookings go through the engine so calendar locks and prices are real
  const services = mongoServices();
  const today = dayBucket(new Date());
  for (const b of fx.bookings) {
    const checkIn = addDays(today, b.startInDays);
    const guestId = at(fx.guests, b.guestIndex);
    const created = await services.bookings.createBooking({
      listingId: at(fx.listings, b.listingIndex).id,
      guestId,
      checkIn,
      checkOut: addDays(checkIn, b.nights),
      guests: b.guests,
      contact: { email: `guest-${b.guestIndex + 1}@example.com` },
    });
    if (b.confirm) await services.bookings.transitionStatus(created.id, "confirmed", guestId);
  }

  await Review.insertMany(
    fx.reviews.map((r) => ({
      listingId: new mongoose.Types.ObjectId(at(fx.listings, r.listingIndex).id),
      reviewerId: new mongoose.Types.ObjectId(at(fx.guests, r.guestIndex)),
      rating: r.rating,
      comment: r.comment,
    }))
  );

  logger.info("seed.done", {
    listings: fx.listings.length,
    bookings: fx.bookings.length,
    reviews: fx.reviews.length,
  });
}

main()
  .then(() => closeMongo())
  .catch(async (err) => {
    logger.error("seed.failed", { message: err instanceof Error ? err.message : String(err) });
    await closeMongo();
    process.exit(1);
  });
