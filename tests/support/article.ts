import type { RecordAccessPolicy } from '../../libs/policy/accessPolicy.js';
import type { AssignOptions, AttributePayload, RecordId, RecordProvider } from '../../libs/records/provider.js';
import { RecordNotFoundError } from '../../libs/errors/RecordNotFoundError.js';

export interface TestActor {
    readonly id: string;
    readonly role: 'admin' | 'editor' | 'reader' | 'anonymous';
}

export const ADMIN: TestActor = { id: 'user-admin', role: 'admin' };
export const EDITOR: TestActor = { id: 'user-editor', role: 'editor' };
export const OTHER_EDITOR: TestActor = { id: 'user-other', role: 'editor' };
export const READER: TestActor = { id: 'user-reader', role: 'reader' };
export const ANONYMOUS: TestActor = { id: 'anonymous', role: 'anonymous' };

export interface ArticleRow {
    readonly id: number;
    readonly title: string;
    readonly authorId: string | undefined;
    readonly published: boolean;
    readonly publishedAt: Date | null;
}

export class Article implements RecordAccessPolicy<TestActor> {
    id: number | undefined;
    title = '';
    authorId: string | undefined;
    published = false;
    publishedAt: Date | null = null;
    errors: string[] = [];

    viewableBy(actor: TestActor): boolean {
        return this.published || actor.role === 'admin' || actor.id === this.authorId;
    }

    creatableBy(actor: TestActor): boolean {
        return actor.role === 'admin' || actor.role === 'editor';
    }

    updatableBy(actor: TestActor): boolean {
        return actor.role === 'admin' || (actor.role === 'editor' && actor.id === this.authorId);
    }

    // Async on purpose: predicates may consult other services.
    async destroyableBy(actor: TestActor): Promise<boolean> {
        return actor.role === 'admin';
    }
}

/**
 * In-process record provider over a Map. Loaded records are copies, so changes
 * reach the store only through save().
 */
export class InMemoryArticleProvider implements RecordProvider<Article, TestActor> {
    readonly recordType = 'Article';
    readonly calls: string[] = [];
    private readonly rows = new Map<number, ArticleRow>();
    private nextId = 1;

    listableBy(actor: TestActor): boolean {
        return actor.role !== 'anonymous';
    }

    insert(attributes: Partial<Omit<ArticleRow, 'id'>>): Article {
        const article = new Article();
        Object.assign(article, attributes);
        if (!this.save(article)) {
            throw new Error(`Invalid fixture: ${article.errors.join(', ')}`);
        }
        this.calls.length = 0;
        return article;
    }

    stored(id: number): ArticleRow | undefined {
        return this.rows.get(id);
    }

    get size(): number {
        return this.rows.size;
    }

    findById(id: RecordId): Article {
        this.calls.push(`findById:${id}`);
        const row = this.rows.get(Number(id));
        if (!row) {
            throw new RecordNotFoundError(this.recordType, id);
        }
        const article = new Article();
        Object.assign(article, row);
        return article;
    }

    build(attributes: AttributePayload = {}): Article {
        this.calls.push('build');
        const article = new Article();
        applyAttributes(article, attributes, true);
        return article;
    }

    assign(record: Article, attributes: AttributePayload, options: AssignOptions): void {
        this.calls.push(`assign:${options.as ?? 'default'}`);
        applyAttributes(record, attributes, options.as === 'admin');
    }

    save(record: Article): boolean {
        this.calls.push('save');
        record.errors = [];
        if (record.title.trim() === '') {
            record.errors.push('title must not be blank');
            return false;
        }
        if (record.id === undefined) {
            record.id = this.nextId++;
        }
        this.rows.set(record.id, {
            id: record.id,
            title: record.title,
            authorId: record.authorId,
            published: record.published,
            publishedAt: record.publishedAt
        });
        return true;
    }

    destroy(record: Article): void {
        this.calls.push('destroy');
        if (record.id !== undefined) {
            this.rows.delete(record.id);
        }
    }

    isRecord(value: unknown): value is Article {
        return value instanceof Article;
    }

    idOf(record: Article): RecordId | undefined {
        return record.id;
    }
}

/**
 * `published` and `publishedAt` are only assignable in the admin role.
 */
function applyAttributes(article: Article, attributes: AttributePayload, privileged: boolean): void {
    const { title, authorId, published, publishedAt } = attributes;
    if (typeof title === 'string') article.title = title;
    if (typeof authorId === 'string') article.authorId = authorId;
    if (!privileged) return;
    if (typeof published === 'boolean') article.published = published;
    if (publishedAt instanceof Date) article.publishedAt = publishedAt;
}
