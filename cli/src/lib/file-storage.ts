import fs from "fs-extra";
import path from "path";
import jsonStableStringify from "json-stable-stringify";
import { FieldValue, IDocument, IStorage } from "task-sync";

//
// Keeps each collection as a JSON file in a directory.
//
// Changes to a collection are applied one at a time, each one reading the file and writing it back in full.
//
export class FileStorage<DocumentT extends IDocument> implements IStorage<DocumentT> {

    //
    // The last queued change for each collection.
    //
    private queues = new Map<string, Promise<void>>();

    constructor(private readonly directory: string, private readonly isDocument: (value: unknown) => value is DocumentT) {
    }

    async getAllDocuments(collectionName: string): Promise<DocumentT[]> {
        return this.exclusive(collectionName, () => this.load(collectionName));
    }

    async getMatchingDocuments(collectionName: string, fieldName: keyof DocumentT, fieldValue: FieldValue): Promise<DocumentT[]> {
        const documents = await this.getAllDocuments(collectionName);
        return documents.filter(document => document[fieldName] === fieldValue);
    }

    async getDocument(collectionName: string, id: string): Promise<DocumentT | undefined> {
        const documents = await this.getAllDocuments(collectionName);
        return documents.find(document => document.id === id);
    }

    async storeDocument(collectionName: string, document: DocumentT): Promise<void> {
        await this.updateDocument(collectionName, document.id, () => document);
    }

    async updateDocument(collectionName: string, id: string, update: (existing: DocumentT | undefined) => DocumentT | undefined): Promise<DocumentT | undefined> {
        return this.exclusive(collectionName, async () => {
            const documents = await this.load(collectionName);
            const index = documents.findIndex(existing => existing.id === id);
            const updated = update(index === -1 ? undefined : documents[index]);
            if (!updated) {
                return undefined;
            }

            if (index === -1) {
                documents.push(updated);
            }
            else {
                documents[index] = updated;
            }

            await this.save(collectionName, documents);
            return updated;
        });
    }

    async deleteDocument(collectionName: string, id: string): Promise<void> {
        await this.exclusive(collectionName, async () => {
            const documents = await this.load(collectionName);
            const remaining = documents.filter(document => document.id !== id);
            if (remaining.length !== documents.length) {
                await this.save(collectionName, remaining);
            }
        });
    }

    async deleteAllDocuments(collectionName: string): Promise<void> {
        await this.exclusive(collectionName, () => this.save(collectionName, []));
    }

    //
    // Gets the path of the file that holds a collection.
    //
    filePath(collectionName: string): string {
        if (!/^[\w-]+$/.test(collectionName)) {
            throw new Error(`Invalid collection name "${collectionName}".`);
        }

        return path.join(this.directory, `${collectionName}.json`);
    }

    //
    // Reads a collection, a missing file is an empty collection.
    //
    private async load(collectionName: string): Promise<DocumentT[]> {
        const filePath = this.filePath(collectionName);
        if (!await fs.pathExists(filePath)) {
            return [];
        }

        const data: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
        if (!Array.isArray(data)) {
            throw new Error(`Expected ${filePath} to contain an array of documents.`);
        }

        const documents: DocumentT[] = [];
        for (const item of data) {
            if (!this.isDocument(item)) {
                throw new Error(`${filePath} contains an invalid document.`);
            }
            documents.push(item);
        }

        return documents;
    }

    private async save(collectionName: string, documents: DocumentT[]): Promise<void> {
        const json = jsonStableStringify(documents, { space: 2 });
        if (json === undefined) {
            throw new Error(`Failed to serialize collection ${collectionName}.`);
        }

        await fs.outputFile(this.filePath(collectionName), json);
    }

    //
    // Runs the operation after every earlier operation on the collection has finished.
    //
    private exclusive<ResultT>(collectionName: string, operation: () => Promise<ResultT>): Promise<ResultT> {
        const previous = this.queues.get(collectionName) || Promise.resolve();
        const result = previous.then(operation);

        //
        // The caller gets the failure through the result, the queue carries on regardless.
        //
        const next: Promise<void> = result
            .catch(() => undefined)
            .then(() => {
                if (this.queues.get(collectionName) === next) {
                    this.queues.delete(collectionName);
                }
            });
        this.queues.set(collectionName, next);

        return result;
    }
}
