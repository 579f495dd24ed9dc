/**
 * Catalog: owns Book records and their copy-availability counts.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures are thrown as LibraryErrors.
 * Books handed out are copies; only the catalog's own methods change its state.
 */

import {
    DataIntegrityError,
    DuplicateKeyError,
    InvalidArgumentError,
    InvalidOperationError,
    NoAvailabilityError,
    NotFoundError,
} from '../errors.js';
import { describeIssues } from '../utils/validation.js';
import { BookUpdateSchema, NewBookSchema } from '../types/index.js';
import type { Book, BookUpdate, NewBook } from '../types/index.js';

export class Catalog {
    private readonly books = new Map<string, Book>();

    get size(): number {
        return this.books.size;
    }

    /**
     * Add a new title with every copy on the shelf.
     *
     * @throws {InvalidArgumentError} Blank id or fewer than one copy.
     * @throws {DuplicateKeyError} The id is already catalogued.
     */
    addBook(input: NewBook): Book {
        const parsed = NewBookSchema.safeParse(input);
        if (!parsed.success) {
            throw new InvalidArgumentError(describeIssues(parsed.error));
        }
        const data = parsed.data;

        if (this.books.has(data.book_id)) {
            throw new DuplicateKeyError(`Book ID ${data.book_id} already exists`);
        }

        const book: Book = {
            book_id: data.book_id,
            title: data.title,
            author: data.author,
            category: data.category,
            total_copies: data.total_copies,
            available_copies: data.total_copies,
        };
        this.books.set(book.book_id, book);
        return { ...book };
    }

    /**
     * Edit a title's details or copy count.
     *
     * Blank text fields keep the existing value. A new copy count moves
     * available_copies by the same delta, so the issued count is unchanged.
     *
     * @throws {NotFoundError} Unknown book id.
     * @throws {InvalidOperationError} New total below the copies currently issued.
     * @throws {InvalidArgumentError} New total below 1 with nothing issued.
     */
    updateBook(bookId: string, changes: BookUpdate): Book {
        const book = this.require(bookId);

        const parsed = BookUpdateSchema.safeParse(changes);
        if (!parsed.success) {
            throw new InvalidArgumentError(describeIssues(parsed.error));
        }
        const { title, author, category, total_copies: newTotal } = parsed.data;

        if (newTotal !== undefined) {
            const issued = book.total_copies - book.available_copies;
            if (issued > 0 && newTotal < issued) {
                throw new InvalidOperationError(
                    `Cannot reduce below number of currently issued copies (${issued})`
                );
            }
            if (newTotal < 1) {
                throw new InvalidArgumentError('Total copies must be at least 1');
            }
        }

        if (title) book.title = title;
        if (author) book.author = author;
        if (category) book.category = category;
        if (newTotal !== undefined) {
            const diff = newTotal - book.total_copies;
            book.total_copies = newTotal;
            book.available_copies += diff;
        }

        return { ...book };
    }

    /**
     * @throws {NotFoundError} Unknown book id.
     */
    find(bookId: string): Book {
        return { ...this.require(bookId) };
    }

    has(bookId: string): boolean {
        return this.books.has(bookId);
    }

    /**
     * Every book, in the order it was added.
     */
    all(): Book[] {
        return [...this.books.values()].map(book => ({ ...book }));
    }

    /**
     * Books whose title, author or category contains the keyword,
     * case-insensitively. Results are produced lazily.
     *
     * @throws {InvalidArgumentError} Blank keyword (raised on call, not on iteration).
     */
    search(keyword: string): Generator<Book, void, undefined> {
        const needle = keyword.trim().toLowerCase();
        if (needle === '') {
            throw new InvalidArgumentError('Keyword cannot be empty');
        }
        return this.matching(needle);
    }

    /**
     * Take one copy off the shelf. Called by the ledger on issue.
     * @internal
     */
    checkOut(bookId: string): void {
        const book = this.require(bookId);
        if (book.available_copies <= 0) {
            throw new NoAvailabilityError(`No available copies of ${bookId} to issue`);
        }
        book.available_copies -= 1;
    }

    /**
     * Put one copy back. Called by the ledger on return.
     * @internal
     */
    checkIn(bookId: string): void {
        const book = this.require(bookId);
        if (book.available_copies >= book.total_copies) {
            throw new DataIntegrityError(`All copies of ${bookId} are already on the shelf`);
        }
        book.available_copies += 1;
    }

    private *matching(needle: string): Generator<Book, void, undefined> {
        for (const book of this.books.values()) {
            if (
                book.title.toLowerCase().includes(needle) ||
                book.author.toLowerCase().includes(needle) ||
                book.category.toLowerCase().includes(needle)
            ) {
                yield { ...book };
            }
        }
    }

    private require(bookId: string): Book {
        const book = this.books.get(bookId);
        if (!book) {
            throw new NotFoundError(`Book ${bookId} not found`);
        }
        return book;
    }
}
