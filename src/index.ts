import express from 'express';
import cors from 'cors';
import insulationRoutes from './routes/insulation';
import { isDatabaseConfigured, testConnection } from './services/database';
import { getConfig } from './config';
import { API_VERSION } from './transformers/quote';

const config = getConfig();

const app = express();
const PORT = config.port;

app.use(cors());
app.use(express.json({ limit: '10mb' }));

// Health check
app.get('/health', (req, res) => {
  res.json({
    status: 'ok',
    version: API_VERSION,
    trade: 'insulation',
    database: isDatabaseConfigured() ? 'configured' : 'not configured',
    price_book_path: config.price_book_path ?? null,
    endpoints: {
      estimate: '/api/v1/insulation/estimate',
      materials: '/api/v1/insulation/materials',
      alternatives: '/api/v1/insulation/alternatives'
    }
  });
});

app.use('/api/v1/insulation', insulationRoutes);

async function startServer() {
  const dbConfigured = isDatabaseConfigured();
  let dbConnected = false;

  if (dbConfigured) {
    dbConnected = await testConnection();
  }

  app.listen(PORT, () => {
    console.log(`🚀 Insulation Estimation API v${API_VERSION} running on port ${PORT}`);
    console.log('');
    console.log('📊 Price Book:');
    if (config.price_book_path) {
      console.log(`   📄 File: ${config.price_book_path}`);
    } else if (!dbConfigured) {
      console.log('   ⚠️  Database not configured - using built-in default prices');
    } else if (dbConnected) {
      console.log('   ✅ Connected to Supabase');
    } else {
      console.log('   ❌ Configured but connection failed');
    }
    console.log('');
    console.log('📌 API Endpoints:');
    console.log(`   Health:       http://localhost:${PORT}/health`);
    console.log(`   Estimate:     POST http://localhost:${PORT}/api/v1/insulation/estimate`);
    console.log(`   Text Quote:   POST http://localhost:${PORT}/api/v1/insulation/estimate?format=text`);
    console.log(`   Materials:    POST http://localhost:${PORT}/api/v1/insulation/materials`);
    console.log(`   Alternatives: POST http://localhost:${PORT}/api/v1/insulation/alternatives`);
    console.log(`   Price Book:   http://localhost:${PORT}/api/v1/insulation/price-book`);
    console.log(`   DB Status:    http://localhost:${PORT}/api/v1/insulation/db-status`);
  });
}

startServer().catch(err => {
  console.error('❌ Failed to start server:', err);
  process.exit(1);
});

export default app;
