import assert from "node:assert/strict";
import test from "node:test";
import { app } from "../app.js";

const PROGRAM = "4\n2\n0\ndown 2 1\nright 1 2\nup 1\nup 1 9\ndown 0 4\n";
const RASTER = "04\n10\n12\n00\n";

function post(path: string, body: string): Promise<Response> {
    return Promise.resolve(app.request(path, { method: "POST", body }));
}

test("GET /health reports ok", async () => {
    const res = await app.request("/health");
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { status: "ok" });
});

test("GET / serves the HTML docs", async () => {
    const res = await app.request("/");
    assert.equal(res.status, 200);
    assert.ok((await res.text()).includes("<h1>hexdraw API</h1>"));
});

test("POST /draw returns the raster text", async () => {
    const res = await post("/draw", PROGRAM);
    assert.equal(res.status, 200);
    assert.ok(res.headers.get("Content-Type")?.startsWith("text/plain"));
    assert.equal(await res.text(), RASTER);
});

test("POST /draw with a malformed command is a 400 naming the line", async () => {
    const res = await post("/draw", "2\n2\n0\nsideways 1\n");
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), {
        error: 'Bad direction (should be up, down, left, or right): "sideways" (line 4)',
        line: 4,
    });
});

test("POST /draw painting outside the raster is a 422", async () => {
    const res = await post("/draw", "2\n2\n0\nright 5 1\n");
    assert.equal(res.status, 422);
    assert.deepEqual(await res.json(), {
        error: "Command 1 paints outside the raster at (0, 2)",
        command: "right 5 1",
        position: { row: 0, col: 2 },
    });
});

test("POST /draw/image.svg renders at the requested scale", async () => {
    const res = await post("/draw/image.svg?scale=2", PROGRAM);
    assert.equal(res.status, 200);
    assert.equal(res.headers.get("Content-Type"), "image/svg+xml");
    const svg = await res.text();
    assert.ok(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="4" height="8" viewBox="0 0 2 4"'));
});

test("POST /draw/image.svg rejects a bad scale", async () => {
    const res = await post("/draw/image.svg?scale=0", PROGRAM);
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), { error: 'Invalid scale: "0". Must be an integer 1-64.' });
});

test("POST /draw/image.png returns PNG bytes", async () => {
    const res = await post("/draw/image.png?scale=4", PROGRAM);
    assert.equal(res.status, 200);
    assert.equal(res.headers.get("Content-Type"), "image/png");
    const bytes = new Uint8Array(await res.arrayBuffer());
    assert.deepEqual(Array.from(bytes.subarray(0, 4)), [0x89, 0x50, 0x4e, 0x47]);
});

test("POST /compress returns the shortest drawing", async () => {
    const res = await post("/compress", RASTER);
    assert.equal(res.status, 200);
    assert.equal(res.headers.get("X-Strategy"), "column-serpentine");
    assert.equal(res.headers.get("X-Command-Count"), "6");
    assert.equal(await res.text(), "4\n2\n0\ndown 2 1\ndown 1 0\nright 1 0\nup 1 2\nup 1 0\nup 1 4\n");
});

test("POST /compress honours a forced strategy", async () => {
    const res = await post("/compress?strategy=row-sparse", RASTER);
    assert.equal(res.status, 200);
    assert.equal(res.headers.get("X-Strategy"), "row-sparse");
    assert.equal(res.headers.get("X-Command-Count"), "7");
});

test("POST /compress rejects an unknown strategy", async () => {
    const res = await post("/compress?strategy=zigzag", RASTER);
    assert.equal(res.status, 400);
});

test("POST /compress with a ragged raster is a 400", async () => {
    const res = await post("/compress", "012\n01\n");
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), {
        error: "Inconsistent line lengths: 3 and 2 on lines 1 and 2 (line 2)",
        line: 2,
    });
});

test("POST /compress/report compares every strategy", async () => {
    const res = await post("/compress/report", RASTER);
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
        height: 4,
        width: 2,
        histogram: [4, 2, 1, 0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
        strategy: "column-serpentine",
        commandCount: 6,
        candidates: [
            { strategy: "row-serpentine", commandCount: 7 },
            { strategy: "column-serpentine", commandCount: 6 },
            { strategy: "row-sparse", commandCount: 7 },
            { strategy: "column-sparse", commandCount: 6 },
        ],
        mismatchedCells: 0,
    });
});

test("oversized bodies are rejected", async () => {
    const res = await post("/compress", "0".repeat(1_048_577));
    assert.equal(res.status, 413);
});

test("image routes refuse renders beyond the pixel limit", async () => {
    const program = "1000\n1000\n0\nright 5 3\n";
    const expected = { error: "Image of 64000x64000 pixels exceeds the 16777216 pixel limit. Use a smaller scale." };

    const svg = await post("/draw/image.svg?scale=64", program);
    assert.equal(svg.status, 400);
    assert.deepEqual(await svg.json(), expected);

    const png = await post("/draw/image.png?scale=64", program);
    assert.equal(png.status, 400);
    assert.deepEqual(await png.json(), expected);
});

test("POST /draw rejects distances beyond 32 bits", async () => {
    const res = await post("/draw", "1\n1\n0\nright 9007199254740991\n");
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), {
        error: 'Bad distance (should be between -2147483648 and 2147483647): "9007199254740991" (line 4)',
        line: 4,
    });
});
