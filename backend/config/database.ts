import mongoose from 'mongoose';
import { loadEnvironment, shouldLog } from './environment';

// Import models to ensure indexes are created
import Advisor from '../models/Advisor';
import Counter from '../models/Counter';
import Course from '../models/Course';
import Department from '../models/Department';
import Instructor from '../models/Instructor';
import Prerequisite from '../models/Prerequisite';
import Section from '../models/Section';
import Student from '../models/Student';
import Takes from '../models/Takes';
import Teaches from '../models/Teaches';

export interface DatabaseConfig {
  uri: string;
  options: mongoose.ConnectOptions;
}

const log = (message: string): void => {
  if (shouldLog(loadEnvironment().LOG_LEVEL, 'info')) {
    console.log(message);
  }
};

export const getDatabaseConfig = (): DatabaseConfig => {
  const { MONGODB_URI } = loadEnvironment();

  const options: mongoose.ConnectOptions = {
    maxPoolSize: 10,
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 45000,

    // Transactions need majority writes and primary reads
    retryWrites: true,
    w: 'majority',
    readPreference: 'primary'
  };

  return { uri: MONGODB_URI, options };
};

export const ensureIndexes = async (): Promise<void> => {
  log('Creating academic records indexes...');

  await Promise.all([
    Department.createIndexes(),
    Student.createIndexes(),
    Instructor.createIndexes(),
    Course.createIndexes(),
    Prerequisite.createIndexes(),
    Section.createIndexes(),
    Takes.createIndexes(),
    Teaches.createIndexes(),
    Advisor.createIndexes(),
    Counter.createIndexes()
  ]);

  log('Academic records indexes created successfully');
};

export const connectDatabase = async (): Promise<void> => {
  const { uri, options } = getDatabaseConfig();

  log('Connecting to MongoDB...');
  await mongoose.connect(uri, options);
  log('MongoDB connected successfully');

  await ensureIndexes();
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.disconnect();
  log('MongoDB disconnected');
};

mongoose.connection.on('error', (error: unknown) => {
  if (shouldLog(loadEnvironment().LOG_LEVEL, 'error')) {
    console.error('Mongoose connection error:', error);
  }
});
