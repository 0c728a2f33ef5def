/**
 * Basic Usage Example
 *
 * Walks one training run and a child fold through their lifecycle.
 * Needs a MongoDB server; set RUNSTORE_MONGO_URI to point elsewhere.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { connectStore } from "@runstore/sdk";

async function main() {
  // Open store
  console.log("📂 Connecting...");
  const store = await connectStore({
    uri: process.env.RUNSTORE_MONGO_URI ?? "mongodb://127.0.0.1:27017",
    database: "runstore_examples",
    collection: "experiments",
  });

  try {
    // CREATE: a parent run and one fold
    console.log("\n✏️  Creating experiments...");
    const parent = await store.create("train-v1", {
      tags: ["baseline"],
      config: { lr: 0.001, epochs: 10 },
    });
    const fold = await store.create("train-v1-fold0", { parent_id: parent });
    console.log(`✅ Created ${parent.toHexString()} and ${fold.toHexString()}`);

    // READ
    console.log("\n📖 Reading the fold...");
    const doc = await store.get(fold);
    if (doc) {
      console.log(`   Name: ${doc.name}`);
      console.log(`   Status: ${doc.status}`);
      console.log(`   Parent: ${doc.parent_id?.toHexString()}`);
    }

    // UPDATE: progress and heartbeat
    console.log("\n💓 Reporting progress...");
    await store.update(fold, { info: { epoch: 1, loss: 0.42 } });
    await store.setHeartbeat(fold);

    // FINISH
    console.log("\n🏁 Finishing the fold...");
    await store.setFinished(fold, "COMPLETED", { exit_code: 0 });

    // QUERY: running experiments, most recent heartbeat first
    console.log("\n🔍 Listing running experiments...");
    for await (const run of store.iterDocs({ filter: { status: "RUNNING" }, limit: 10 })) {
      console.log(`   - ${run.id.toHexString()}: ${run.name}`);
    }

    // DELETE: soft-delete the tree, then remove it
    console.log("\n🗑️  Deleting the tree...");
    const marked = await store.markDelete(parent);
    const removed = await store.completeDeletion(marked);
    console.log(`✅ Marked ${marked.length}, removed ${removed}`);
  } finally {
    await store.close();
  }

  console.log("\n✅ Example completed successfully!");
}

main().catch(console.error);
