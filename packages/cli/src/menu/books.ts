import type { BookUpdate } from '@library-circulation/core';
import { askInt, askText } from '../utils/prompt.js';
import { log, success, warn } from '../utils/console.js';
import { describeBook } from '../format/display.js';
import type { MenuAction } from '../types.js';

export const addBook: MenuAction = async ({ library, prompter }) => {
    log('\n--- Add New Book ---');
    const bookId = await askText(prompter, 'Enter Book ID: ');
    if (library.catalog.has(bookId)) {
        warn('Book ID already exists. Use update option instead.');
        return;
    }

    const title = await askText(prompter, 'Enter Title: ');
    const author = await askText(prompter, 'Enter Author: ');
    const category = await askText(prompter, 'Enter Category (Fiction/Science/etc.): ');
    const totalCopies = await askInt(prompter, 'Enter Total Copies: ', 1);
    if (totalCopies === null) return;

    library.catalog.addBook({
        book_id: bookId,
        title,
        author,
        category,
        total_copies: totalCopies,
    });
    success('Book added successfully.');
};

export const viewAllBooks: MenuAction = async ({ library }) => {
    log('\n--- All Books ---');
    const books = library.catalog.all();
    if (books.length === 0) {
        log('No books in inventory.');
        return;
    }
    for (const book of books) {
        log(describeBook(book));
    }
};

export const searchBooks: MenuAction = async ({ library, prompter }) => {
    log('\n--- Search Books ---');
    const keyword = await askText(prompter, 'Enter keyword (title/author/category): ');

    let found = 0;
    for (const book of library.catalog.search(keyword)) {
        log(describeBook(book));
        found++;
    }
    if (found === 0) {
        log('No matching books found.');
    }
};

export const updateBook: MenuAction = async ({ library, prompter }) => {
    log('\n--- Update Book ---');
    const bookId = await askText(prompter, 'Enter Book ID to update: ');
    const book = library.catalog.find(bookId);

    log('Leave any field blank to keep existing value.');
    const changes: BookUpdate = {
        title: await askText(prompter, `Title [${book.title}]: `),
        author: await askText(prompter, `Author [${book.author}]: `),
        category: await askText(prompter, `Category [${book.category}]: `),
    };

    const totalInput = await askText(prompter, `Total copies [${book.total_copies}]: `);
    if (totalInput !== '') {
        if (/^-?\d+$/.test(totalInput)) {
            changes.total_copies = parseInt(totalInput, 10);
        } else {
            warn('Invalid total copies. Keeping old value.');
        }
    }

    const updated = library.catalog.updateBook(bookId, changes);
    success(`Book updated: ${describeBook(updated)}`);
};
