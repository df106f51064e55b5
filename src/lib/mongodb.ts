import { MongoClient, ServerApiVersion } from "mongodb";
import { StoreConnectionError, errorMessage } from "./errors";

/**
 * Open a MongoDB client and verify it with a ping.
 * The client is closed again when the ping fails.
 */
export async function connectToMongo(uri: string): Promise<MongoClient> {
  const client = new MongoClient(uri, {
    serverApi: {
      version: ServerApiVersion.v1,
      strict: true,
      deprecationErrors: true,
    },
  });

  try {
    await client.connect();
    await client.db("admin").command({ ping: 1 });
    console.log("✅ [Result Store] Successfully connected to MongoDB");
    return client;
  } catch (error) {
    await client.close();
    throw new StoreConnectionError(`Failed to connect to MongoDB: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
