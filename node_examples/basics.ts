import fs from "fs";
import { CacheMatrix, IO, Matrix, cacheSolve } from "../src";

// Usage: tsx node_examples/basics.ts [matrix.csv]
const csvPath = process.argv[2];
const initial = csvPath
    ? IO.importCSV(fs.readFileSync(csvPath, "utf8"))
    : [[3, 0], [1, 2]];

const holder = new CacheMatrix(initial);

console.log(`⚙️ Inverting ${holder.size}×${holder.size} matrix:\n${IO.exportCSV(holder.get())}`);
const inverse = cacheSolve(holder);
console.log(`✅ Inverse:\n${IO.exportCSV(inverse)}`);

// Second call is served from the cache
cacheSolve(holder);

const check = Matrix.multiply(holder.get(), inverse);
console.log(`🔍 M × M⁻¹ ≈ I: ${Matrix.approxEqual(check, Matrix.identity(holder.size), 1e-6)}`);

// Replacing the matrix invalidates the cache
holder.set([[3, 0, 0], [1, 1, 0], [1, 1, 2]]);
const inverse3 = cacheSolve(holder, { solver: "gauss-jordan" });
console.log(`✅ New inverse:\n${IO.exportCSV(inverse3)}`);
