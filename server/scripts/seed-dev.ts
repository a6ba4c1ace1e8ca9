import { env } from "../src/config/env";
import { type NewReading, ReadingStore } from "../src/db/reading-store";
import { formatUtcTimestamp } from "../src/utils/time";

const SEED_DEVICES = ["GMC-DEV-01", "GMC-DEV-02"];
const SEED_DAYS = 14;
const INTERVAL_MINUTES = 30;

function sampleCpm(step: number, deviceIndex: number): number {
  // Background level with a slow daily swing and a little per-device offset.
  return Math.round(18 + 4 * Math.sin(step / 24) + deviceIndex * 2 + (step % 7));
}

async function main(): Promise<void> {
  const store = await ReadingStore.open(env.DB_FILE);

  try {
    store.ensureSchema();

    const now = Date.now();
    const steps = (SEED_DAYS * 24 * 60) / INTERVAL_MINUTES;
    const readings: NewReading[] = [];

    for (let step = steps; step >= 0; step -= 1) {
      const receivedAt = new Date(now - step * INTERVAL_MINUTES * 60 * 1000);
      SEED_DEVICES.forEach((deviceId, deviceIndex) => {
        const cpm = sampleCpm(step, deviceIndex);
        const acpm = (cpm * 0.97).toFixed(2);
        const usv = (cpm * 0.0065).toFixed(3);
        const params = { AID: deviceId, CPM: String(cpm), ACPM: acpm, uSV: usv };
        readings.push({
          timestamp: formatUtcTimestamp(receivedAt),
          device_id: deviceId,
          cpm: String(cpm),
          acpm,
          usv,
          dose: "0",
          raw_data: JSON.stringify(params),
          client_ip: "127.0.0.1"
        });
      });
    }
    const inserted = store.insertMany(readings).length;

    // eslint-disable-next-line no-console
    console.log(`Seed complete: ${inserted} readings in ${env.DB_FILE}`);
  } finally {
    store.close();
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
