import {
  KeySync,
  MemoryDirectory,
  MemoryStorage,
  StaticFingerprintProvider,
  isProtocolError,
} from "../src";

// Two devices of one user and a peer, all sharing an in-process directory.
// Swap MemoryDirectory for the default transport to talk to a real database.
const DIRECTORY = { directoryEndpointUrl: "https://keys.example.com" };

async function runExample() {
  console.log("=== Key directory sync demo ===\n");

  const directory = new MemoryDirectory();

  const alicePhone = new KeySync({
    storage: new MemoryStorage(),
    transport: directory,
    fingerprintProvider: new StaticFingerprintProvider("phone-hardware", "android"),
  });
  const aliceLaptop = new KeySync({
    storage: new MemoryStorage(),
    transport: directory,
    fingerprintProvider: new StaticFingerprintProvider("laptop-hardware", "linux"),
  });
  const bob = new KeySync({
    storage: new MemoryStorage(),
    transport: directory,
    fingerprintProvider: new StaticFingerprintProvider("bob-hardware", "macos"),
  });

  // 1. Initialize. With autoSync on, each device publishes its bundle.
  await alicePhone.initialize("alice", DIRECTORY);
  await aliceLaptop.initialize("alice", DIRECTORY);
  await bob.initialize("bob", DIRECTORY);

  const phoneInfo = await alicePhone.getInstanceInfo();
  console.log("Alice phone:", phoneInfo.deviceId, phoneInfo.state);

  // 2. Bob looks up Alice before starting a conversation.
  console.log("Bob sees keys for alice:", await bob.hasKeysForUser("alice"));
  const bundles = await bob.fetchBundles("alice");
  console.log(
    "Alice devices:",
    bundles.map((b) => `${b.deviceId} (signed pre-key ${b.signedPreKeyId})`),
  );

  // 3. Bob follows changes to Alice's device list.
  const stop = bob.onKeysChanged((event) => {
    console.log(
      `[${event.userId}] ${event.deviceId}:`,
      event.bundle ? "updated" : "removed",
    );
  });
  await bob.refreshUserKeys("alice");

  // 4. The laptop goes offline, rotates pre-keys and syncs on reconnect.
  directory.setOnline(false);
  console.log("Refresh while offline:", await aliceLaptop.refreshPreKeys(20));
  console.log("Pending:", (await aliceLaptop.getInstanceInfo()).pendingOperations);
  directory.setOnline(true);
  console.log("Drained:", await aliceLaptop.drainQueue());

  // 5. Errors carry a kind and a code.
  try {
    await bob.hasKeysForUser("not a valid id");
  } catch (error) {
    if (isProtocolError(error, "validation")) {
      console.log("Rejected:", error.code, error.message);
    } else {
      throw error;
    }
  }

  stop();
  await Promise.all([alicePhone.dispose(), aliceLaptop.dispose(), bob.dispose()]);
  console.log("\nDone.");
}

runExample().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
