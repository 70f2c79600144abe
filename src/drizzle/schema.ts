import {
  pgTable,
  serial,
  varchar,
  timestamp,
  integer,
  numeric,
  date,
  index,
  uniqueIndex,
  pgEnum,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// Enums
export const userRoleEnum = pgEnum('user_role', ['Admin', 'Librarian', 'Member']);
export const userStatusEnum = pgEnum('user_status', ['active', 'inactive']);

// Users table
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  username: varchar('username', { length: 50 }).notNull(),
  // SHA-256 hex digest, unsalted
  passwordHash: varchar('password_hash', { length: 255 }).notNull(),
  fullName: varchar('full_name', { length: 100 }),
  email: varchar('email', { length: 100 }),
  role: userRoleEnum('role').notNull().default('Member'),
  status: userStatusEnum('status').notNull().default('active'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
}, (table) => ({
  usersUsernameUnique: uniqueIndex('idx_users_username').on(table.username),
}));

// Books table
export const books = pgTable('books', {
  id: serial('id').primaryKey(),
  title: varchar('title', { length: 255 }).notNull(),
  author: varchar('author', { length: 100 }),
  publisher: varchar('publisher', { length: 100 }),
  publicationYear: integer('publication_year'),
  category: varchar('category', { length: 50 }),
  isbn: varchar('isbn', { length: 20 }),
  quantity: integer('quantity'),
  availableQty: integer('available_qty'),
  price: numeric('price', { precision: 10, scale: 2 }),
}, (table) => ({
  booksIsbnIdx: index('idx_books_isbn').on(table.isbn),
}));

// Borrow records table
export const borrowRecords = pgTable('borrow_records', {
  id: serial('id').primaryKey(),
  userId: integer('user_id').references(() => users.id),
  bookId: integer('book_id').references(() => books.id),
  borrowDate: date('borrow_date'),
  dueDate: date('due_date'),
  returnDate: date('return_date'),
  bookStatus: varchar('book_status', { length: 50 }),
}, (table) => ({
  borrowRecordsUserIdx: index('idx_borrow_records_user').on(table.userId),
  borrowRecordsBookIdx: index('idx_borrow_records_book').on(table.bookId),
}));

// Fines table: at most one fine per borrow record
export const fines = pgTable('fines', {
  id: serial('id').primaryKey(),
  recordId: integer('record_id').references(() => borrowRecords.id),
  fineDate: timestamp('fine_date', { withTimezone: true }).defaultNow(),
  paidStatus: varchar('paid_status', { length: 20 }),
  fineAmount: numeric('fine_amount', { precision: 10, scale: 2 }),
}, (table) => ({
  finesRecordUnique: uniqueIndex('idx_fines_record').on(table.recordId),
}));

// Payments table
export const payments = pgTable('payments', {
  id: serial('id').primaryKey(),
  fineId: integer('fine_id').references(() => fines.id),
  amount: numeric('amount', { precision: 10, scale: 2 }),
  paymentMethod: varchar('payment_method', { length: 50 }),
  paymentDate: timestamp('payment_date', { withTimezone: true }).defaultNow(),
}, (table) => ({
  paymentsFineIdx: index('idx_payments_fine').on(table.fineId),
}));

// Relations
export const usersRelations = relations(users, ({ many }) => ({
  borrowRecords: many(borrowRecords),
}));

export const booksRelations = relations(books, ({ many }) => ({
  borrowRecords: many(borrowRecords),
}));

export const borrowRecordsRelations = relations(borrowRecords, ({ one }) => ({
  user: one(users, {
    fields: [borrowRecords.userId],
    references: [users.id],
  }),
  book: one(books, {
    fields: [borrowRecords.bookId],
    references: [books.id],
  }),
  fine: one(fines),
}));

export const finesRelations = relations(fines, ({ one, many }) => ({
  borrowRecord: one(borrowRecords, {
    fields: [fines.recordId],
    references: [borrowRecords.id],
  }),
  payments: many(payments),
}));

export const paymentsRelations = relations(payments, ({ one }) => ({
  fine: one(fines, {
    fields: [payments.fineId],
    references: [fines.id],
  }),
}));
