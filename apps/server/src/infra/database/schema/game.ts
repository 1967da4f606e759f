import { integer, pgTable, real, serial, text, timestamp } from "drizzle-orm/pg-core";

export const accounts = pgTable("accounts", {
  id: serial("id").primaryKey(),
  username: text("username").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

export const characters = pgTable("characters", {
  id: serial("id").primaryKey(),
  accountId: integer("account_id")
    .notNull()
    .unique()
    .references(() => accounts.id, { onDelete: "cascade" }),
  name: text("name").notNull(),
  x: real("pos_x").notNull().default(0),
  y: real("pos_y").notNull().default(0),
  z: real("pos_z").notNull().default(0),
  hp: integer("hp").notNull(),
  mp: integer("mp").notNull(),
  level: integer("level").notNull().default(1),
  experience: integer("experience").notNull().default(0),
  experienceToNext: integer("experience_to_next").notNull().default(100),
  strength: integer("strength").notNull(),
  dexterity: integer("dexterity").notNull(),
  constitution: integer("constitution").notNull(),
  intelligence: integer("intelligence").notNull(),
  maxHp: integer("max_hp").notNull(),
  maxMp: integer("max_mp").notNull(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});
