/**
 * Express backend server for STL parsing and conversion
 */

import { loadServerConfig } from './config';
import { createApp } from './app';

const config = loadServerConfig();
const app = createApp(config);

// Start server
app.listen(config.port, () => {
  console.log(`Server is running on http://localhost:${config.port}`);
});
