import { buildApp } from './app';
import { config } from './config';
import { getReferenceTables } from './ocr/reference-tables';

async function start() {
  const server = await buildApp();

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    // Fail at startup, not on the first request, if the data files are broken.
    const tables = getReferenceTables();
    server.log.info(
      { countries: tables.countryCodes.size, cities: tables.cities.length },
      'Reference tables loaded'
    );

    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    server.log.error(err);
    await server.close();
    process.exit(1);
  }
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
