import { pool } from '../config/database';
import { TagFixtures } from './TagFixtures';

async function loadFixtures() {
  try {
    console.log('🌱 Loading fixtures...');
    await new TagFixtures().load();
    console.log('✅ Fixtures loaded');
  } catch (error) {
    console.error('❌ Failed to load fixtures:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void loadFixtures();
