import { IDocument } from "./task";

//
// Field values that documents can be matched on.
//
export type FieldValue = string | number | boolean;

//
// An abstracted storage mechanism for the local task store.
//
export interface IStorage<DocumentT extends IDocument> {

    //
    // Gets all documents in a collection, in the order they were first stored.
    //
    getAllDocuments(collectionName: string): Promise<DocumentT[]>;

    //
    // Gets all documents in a collection that have a field with a matching value.
    //
    getMatchingDocuments(collectionName: string, fieldName: keyof DocumentT, fieldValue: FieldValue): Promise<DocumentT[]>;

    //
    // Gets one document from the collection.
    //
    getDocument(collectionName: string, id: string): Promise<DocumentT | undefined>;

    //
    // Stores a document, replacing any document with the same id.
    //
    storeDocument(collectionName: string, document: DocumentT): Promise<void>;

    //
    // Reads a document and stores what the update makes of it, with no other change to the collection in between.
    // Stores nothing when the update returns undefined. Resolves to the stored document.
    //
    updateDocument(collectionName: string, id: string, update: (existing: DocumentT | undefined) => DocumentT | undefined): Promise<DocumentT | undefined>;

    //
    // Deletes a document from the collection.
    //
    deleteDocument(collectionName: string, id: string): Promise<void>;

    //
    // Deletes all documents from a collection.
    //
    deleteAllDocuments(collectionName: string): Promise<void>;
}
