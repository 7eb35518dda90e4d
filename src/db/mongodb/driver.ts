/**
 * Narrow view of the MongoDB driver used by `MongoBackend`.
 *
 * `connectMongo` binds it to a mongoose connection's native database
 * handle; tests bind it to an in-memory database.
 */
import mongoose, { type mongo } from "mongoose";

export type Document = mongo.Document;
export type Filter<T> = mongo.Filter<T>;
export type UpdateFilter<T> = mongo.UpdateFilter<T>;
export type IndexSpecification = mongo.IndexSpecification;
export type CreateIndexesOptions = mongo.CreateIndexesOptions;

export interface DocumentCollection {
  insertOne(doc: Document): Promise<void>;
  findOne(filter: Filter<Document>): Promise<Document | null>;
  countDocuments(filter: Filter<Document>): Promise<number>;
  replaceOne(
    filter: Filter<Document>,
    replacement: Document,
  ): Promise<{ matchedCount: number }>;
  deleteOne(filter: Filter<Document>): Promise<{ deletedCount: number }>;
  deleteMany(filter: Filter<Document>): Promise<{ deletedCount: number }>;
  updateMany(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
  ): Promise<{ modifiedCount: number }>;
  aggregate(pipeline: Document[]): Promise<Document[]>;
  createIndex(
    keys: IndexSpecification,
    options: CreateIndexesOptions,
  ): Promise<string>;
}

export interface DocumentDatabase {
  collection(name: string): DocumentCollection;
  close(): Promise<void>;
}

export type DocumentConnector = (
  uri: string,
  databaseName: string,
) => Promise<DocumentDatabase>;

/** Open a mongoose connection and confirm the server answers a ping. */
export const connectMongo: DocumentConnector = async (uri, databaseName) => {
  const connection = mongoose.createConnection(uri, {
    dbName: databaseName,
    serverSelectionTimeoutMS: 5000,
  });
  try {
    await connection.asPromise();
    const db = connection.db;
    if (!db) throw new Error(`No database handle for ${databaseName}`);
    await db.command({ ping: 1 });

    return {
      collection(name: string): DocumentCollection {
        const coll = db.collection(name);
        return {
          async insertOne(doc) {
            await coll.insertOne(doc);
          },
          findOne: (filter) => coll.findOne(filter),
          countDocuments: (filter) => coll.countDocuments(filter),
          async replaceOne(filter, replacement) {
            const result = await coll.replaceOne(filter, replacement);
            return { matchedCount: Number(result.matchedCount ?? 0) };
          },
          async deleteOne(filter) {
            const result = await coll.deleteOne(filter);
            return { deletedCount: result.deletedCount };
          },
          async deleteMany(filter) {
            const result = await coll.deleteMany(filter);
            return { deletedCount: result.deletedCount };
          },
          async updateMany(filter, update) {
            const result = await coll.updateMany(filter, update);
            return { modifiedCount: result.modifiedCount };
          },
          aggregate: (pipeline) => coll.aggregate(pipeline).toArray(),
          createIndex: (keys, options) => coll.createIndex(keys, options),
        };
      },
      close: () => connection.close(),
    };
  } catch (err) {
    await connection.close();
    throw err;
  }
};
