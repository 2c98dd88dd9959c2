import dotenv from 'dotenv';
dotenv.config();

import mongoose from 'mongoose';
import { connectDatabase, disconnectDatabase } from '../config/database';
import Counter from '../models/Counter';

const SEQUENCES = ['student', 'instructor'] as const;

/**
 * Database initialization: indexes, id sequences and a check that the
 * deployment can run multi-document transactions
 */
async function initializeDatabase(): Promise<void> {
  try {
    console.log('🚀 Starting academic records database initialization...');

    // Connecting also ensures every model's indexes
    await connectDatabase();

    await ensureSequences();
    await checkTransactionSupport();

    console.log('✅ Academic records database initialization completed successfully!');
  } catch (error) {
    console.error('❌ Database initialization failed:', error);
    process.exitCode = 1;
  } finally {
    await disconnectDatabase();
  }
}

async function ensureSequences(): Promise<void> {
  for (const name of SEQUENCES) {
    await Counter.updateOne({ name }, { $setOnInsert: { name, seq: 0 } }, { upsert: true });
  }
  console.log(`📋 Id sequences ready: ${SEQUENCES.join(', ')}`);
}

async function checkTransactionSupport(): Promise<void> {
  const hello = await mongoose.connection.getClient().db().admin().command({ hello: 1 });
  if (typeof hello.setName === 'string') {
    console.log(`📊 Replica set '${hello.setName}' detected, transactions available`);
    return;
  }
  if (hello.msg === 'isdbgrid') {
    console.log('📊 Sharded cluster detected, transactions available');
    return;
  }
  throw new Error('The academic records store needs a replica set or sharded cluster for transactions');
}

void initializeDatabase();
