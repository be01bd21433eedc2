import mongoose from 'mongoose';
import config from '../config';

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof Error && error.name === 'MongoServerError' && 'code' in error && error.code === 11000;

const connectDB = async () => {
  try {
    await mongoose.connect(config.mongoUri, {
      serverSelectionTimeoutMS: 5000, // 5 seconds timeout
    });
    console.log('[db] MongoDB connected successfully.');
  } catch (error) {
    console.error('[db] MongoDB connection failed:', error);
    process.exit(1);
  }
};

export const disconnectDB = async () => {
  await mongoose.disconnect();
  console.log('[db] MongoDB disconnected.');
};

export default connectDB;
