import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateSeatingSchema1760000000000 implements MigrationInterface {
  name = 'CreateSeatingSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "btree_gist"`);

    await queryRunner.query(`
      CREATE TYPE "seats_tier_enum" AS ENUM ('STANDARD', 'PREMIUM', 'VIP')
    `);

    await queryRunner.query(`
      CREATE TYPE "seats_status_enum" AS ENUM ('AVAILABLE', 'OCCUPIED', 'MAINTENANCE', 'BLOCKED')
    `);

    await queryRunner.query(`
      CREATE TYPE "bookings_status_enum" AS ENUM ('PENDING', 'CONFIRMED', 'CANCELLED', 'EXPIRED')
    `);

    await queryRunner.query(`
      CREATE TYPE "booking_history_action_enum" AS ENUM
        ('created', 'confirmed', 'cancelled', 'expired', 'refunded')
    `);

    await queryRunner.query(`
      CREATE TABLE "seats" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "screen_number" integer NOT NULL,
        "row" varchar(5) NOT NULL,
        "seat_number" integer NOT NULL,
        "tier" "seats_tier_enum" NOT NULL DEFAULT 'STANDARD',
        "status" "seats_status_enum" NOT NULL DEFAULT 'AVAILABLE',
        "is_accessible" boolean NOT NULL DEFAULT false,
        "is_couple" boolean NOT NULL DEFAULT false,
        "position_x" integer NOT NULL,
        "position_y" integer NOT NULL,
        "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_seats_screen_row_number" UNIQUE ("screen_number", "row", "seat_number"),
        CONSTRAINT "UQ_seats_screen_position" UNIQUE ("screen_number", "position_x", "position_y"),
        CONSTRAINT "PK_seats" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "showings" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "movie_title" varchar(255) NOT NULL,
        "screen_number" integer NOT NULL,
        "start_time" TIMESTAMPTZ NOT NULL,
        "end_time" TIMESTAMPTZ NOT NULL,
        "base_price" decimal(10,2) NOT NULL,
        "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "CHK_showings_time_window" CHECK ("start_time" < "end_time"),
        CONSTRAINT "EXCL_showings_screen_overlap" EXCLUDE USING gist (
          "screen_number" WITH =,
          tstzrange("start_time", "end_time") WITH &&
        ),
        CONSTRAINT "PK_showings" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "seat_reservations" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "user_id" uuid NOT NULL,
        "showing_id" uuid NOT NULL,
        "seat_id" uuid NOT NULL,
        "session_key" varchar(64),
        "created_at" TIMESTAMPTZ NOT NULL,
        "expires_at" TIMESTAMPTZ NOT NULL,
        CONSTRAINT "UQ_seat_reservations_showing_seat" UNIQUE ("showing_id", "seat_id"),
        CONSTRAINT "PK_seat_reservations" PRIMARY KEY ("id"),
        CONSTRAINT "FK_seat_reservations_showing" FOREIGN KEY ("showing_id")
          REFERENCES "showings"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_seat_reservations_seat" FOREIGN KEY ("seat_id")
          REFERENCES "seats"("id") ON DELETE NO ACTION ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "bookings" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "booking_reference" varchar(32) NOT NULL,
        "user_id" uuid NOT NULL,
        "showing_id" uuid NOT NULL,
        "total_amount" decimal(10,2) NOT NULL,
        "status" "bookings_status_enum" NOT NULL DEFAULT 'PENDING',
        "booked_at" TIMESTAMPTZ NOT NULL,
        "expires_at" TIMESTAMPTZ NOT NULL,
        "confirmed_at" TIMESTAMPTZ,
        "cancelled_at" TIMESTAMPTZ,
        "cancellation_reason" varchar(500),
        "payment_method" varchar(50),
        "payment_reference" varchar(255),
        "notes" text,
        "updated_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_bookings_booking_reference" UNIQUE ("booking_reference"),
        CONSTRAINT "PK_bookings" PRIMARY KEY ("id"),
        CONSTRAINT "FK_bookings_showing" FOREIGN KEY ("showing_id")
          REFERENCES "showings"("id") ON DELETE NO ACTION ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "booked_seats" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "booking_id" uuid NOT NULL,
        "seat_id" uuid NOT NULL,
        "price_paid" decimal(10,2) NOT NULL,
        CONSTRAINT "UQ_booked_seats_booking_seat" UNIQUE ("booking_id", "seat_id"),
        CONSTRAINT "PK_booked_seats" PRIMARY KEY ("id"),
        CONSTRAINT "FK_booked_seats_booking" FOREIGN KEY ("booking_id")
          REFERENCES "bookings"("id") ON DELETE CASCADE ON UPDATE NO ACTION,
        CONSTRAINT "FK_booked_seats_seat" FOREIGN KEY ("seat_id")
          REFERENCES "seats"("id") ON DELETE NO ACTION ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "booking_history" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "booking_id" uuid NOT NULL,
        "action" "booking_history_action_enum" NOT NULL,
        "actor" varchar(64) NOT NULL,
        "occurred_at" TIMESTAMPTZ NOT NULL,
        "metadata" jsonb,
        CONSTRAINT "PK_booking_history" PRIMARY KEY ("id"),
        CONSTRAINT "FK_booking_history_booking" FOREIGN KEY ("booking_id")
          REFERENCES "bookings"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`CREATE INDEX "IDX_seats_screen" ON "seats" ("screen_number")`);
    await queryRunner.query(
      `CREATE INDEX "IDX_showings_screen_start" ON "showings" ("screen_number", "start_time")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_seat_reservations_expires_at" ON "seat_reservations" ("expires_at")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_seat_reservations_user" ON "seat_reservations" ("user_id")`,
    );
    await queryRunner.query(`CREATE INDEX "IDX_bookings_user" ON "bookings" ("user_id")`);
    await queryRunner.query(
      `CREATE INDEX "IDX_bookings_showing_status" ON "bookings" ("showing_id", "status")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_bookings_pending_expiry" ON "bookings" ("expires_at") WHERE "status" = 'PENDING'`,
    );
    await queryRunner.query(`CREATE INDEX "IDX_booked_seats_seat" ON "booked_seats" ("seat_id")`);
    await queryRunner.query(
      `CREATE INDEX "IDX_booking_history_booking" ON "booking_history" ("booking_id", "occurred_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "booking_history"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "booked_seats"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "bookings"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "seat_reservations"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "showings"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "seats"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "booking_history_action_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "bookings_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "seats_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "seats_tier_enum"`);
  }
}
