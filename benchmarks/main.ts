import { iteration } from "./iteration";
import { pushPop } from "./push_pop";

void (async function () {
  console.log("# Benchmark Results");
  console.log(
    "Output of\n```bash\nnpm run benchmarks -s > benchmark_results.md\n```"
  );
  console.log(
    "Each benchmark runs the same workload on LinkedVec with several index types, and on a plain Array where it has an equivalent. Times are wall-clock milliseconds from a single run.\n"
  );

  await pushPop();
  await iteration();
})();
