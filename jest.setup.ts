// Loaded before each test file so config/env validates without a .env
process.env.NODE_ENV = 'test';
process.env.FOURSQUARE_API_KEY = 'test-api-key';
