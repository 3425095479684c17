import path from "path";

export const DEFAULT_WORKSPACE_DIR = path.join(process.cwd(), "workspace");
export const DEFAULT_DATA_FILE = path.join(process.cwd(), "trainer-data.json");
export const SAMPLES_CACHE_FILENAME = "samples_cache.json";

export const SOLUTION_FILENAME = "solution.cpp";
export const BINARY_FILENAME = "solution_bin";
export const STARTED_AT_FILENAME = ".started_at";
export const INPUT_EXTENSION = ".in";
export const OUTPUT_EXTENSION = ".out";

export const SOLUTION_TEMPLATE = `#include <bits/stdc++.h>
using namespace std;

int main() {
    ios::sync_with_stdio(false);
    cin.tie(nullptr);

    return 0;
}
`;

export const DEFAULT_COMPILER = "g++";
export const DEFAULT_COMPILE_FLAGS = ["-O2"];
export const DEFAULT_COMPILE_TIMEOUT_MS = 30000; // 30 second timeout
export const DEFAULT_RUN_TIMEOUT_MS = 5000; // per test case
export const DEFAULT_EDITOR = "nvim";

export const MAX_CAPTURED_OUTPUT = 1024 * 1024; // bytes per stream
