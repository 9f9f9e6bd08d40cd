import _ from "lodash";
import { FieldValue, IStorage } from "./storage";
import { IDocument } from "./task";

//
// Keeps documents in memory.
//
// Documents are copied on the way in and on the way out so callers never share state with the storage.
//
export class MemoryStorage<DocumentT extends IDocument> implements IStorage<DocumentT> {

    private collections = new Map<string, DocumentT[]>();

    //
    // Gets the documents for a collection, lazily creating the collection.
    //
    private documents(collectionName: string): DocumentT[] {
        let documents = this.collections.get(collectionName);
        if (!documents) {
            documents = [];
            this.collections.set(collectionName, documents);
        }

        return documents;
    }

    async getAllDocuments(collectionName: string): Promise<DocumentT[]> {
        return _.cloneDeep(this.documents(collectionName));
    }

    async getMatchingDocuments(collectionName: string, fieldName: keyof DocumentT, fieldValue: FieldValue): Promise<DocumentT[]> {
        const matching = this.documents(collectionName).filter(document => document[fieldName] === fieldValue);
        return _.cloneDeep(matching);
    }

    async getDocument(collectionName: string, id: string): Promise<DocumentT | undefined> {
        const document = this.documents(collectionName).find(document => document.id === id);
        return document && _.cloneDeep(document);
    }

    async storeDocument(collectionName: string, document: DocumentT): Promise<void> {
        await this.updateDocument(collectionName, document.id, () => document);
    }

    async updateDocument(collectionName: string, id: string, update: (existing: DocumentT | undefined) => DocumentT | undefined): Promise<DocumentT | undefined> {
        const documents = this.documents(collectionName);
        const index = documents.findIndex(existing => existing.id === id);
        const updated = update(index === -1 ? undefined : _.cloneDeep(documents[index]));
        if (!updated) {
            return undefined;
        }

        if (index === -1) {
            documents.push(_.cloneDeep(updated));
        }
        else {
            documents[index] = _.cloneDeep(updated);
        }

        return _.cloneDeep(updated);
    }

    async deleteDocument(collectionName: string, id: string): Promise<void> {
        const documents = this.documents(collectionName);
        const index = documents.findIndex(existing => existing.id === id);
        if (index !== -1) {
            documents.splice(index, 1);
        }
    }

    async deleteAllDocuments(collectionName: string): Promise<void> {
        this.collections.set(collectionName, []);
    }
}
