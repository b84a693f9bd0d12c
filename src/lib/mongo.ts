import mongoose from 'mongoose';

export async function connectMongo(uri: string) {
  if (!uri) throw new Error('MONGODB_URI missing');
  if (mongoose.connection.readyState === 1) return mongoose;
  await mongoose.connect(uri, { serverSelectionTimeoutMS: 5000 });
  console.log('[mongo] connected');
  return mongoose;
}

export async function pingMongo(): Promise<{ ok: boolean; error?: string }> {
  try {
    if (!mongoose.connection.db) {
      return { ok: false, error: 'Database connection not established' };
    }
    await mongoose.connection.db.admin().ping();
    return { ok: true };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'Unknown error' };
  }
}
