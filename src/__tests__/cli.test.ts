import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { type CliIo, main } from "../cli.js";

interface Captured extends CliIo {
    out: string;
    err: string;
}

function capture(): Captured {
    const io: Captured = {
        out: "",
        err: "",
        stdout: (text) => {
            io.out += text;
        },
        stderr: (text) => {
            io.err += text;
        },
    };
    return io;
}

function withTempDir<T>(run: (dir: string) => T): T {
    const dir = mkdtempSync(join(tmpdir(), "hexdraw-cli-"));
    try {
        return run(dir);
    } finally {
        rmSync(dir, { recursive: true, force: true });
    }
}

test("draw prints the raster of a program file", () => {
    withTempDir((dir) => {
        const file = join(dir, "example.txt");
        writeFileSync(file, "4\n2\n0\ndown 2 1\nright 1 2\nup 1\nup 1 9\ndown 0 4\n");
        const io = capture();
        assert.equal(main(["draw", file], io), 0);
        assert.equal(io.out, "04\n10\n12\n00\n");
        assert.equal(io.err, "");
    });
});

test("draw --png also writes a PNG file", () => {
    withTempDir((dir) => {
        const file = join(dir, "example.txt");
        const png = join(dir, "example.png");
        writeFileSync(file, "2\n2\n3\nright 1 4\n");
        assert.equal(main(["draw", file, "--png", png], capture()), 0);
        assert.deepEqual(Array.from(readFileSync(png).subarray(0, 4)), [0x89, 0x50, 0x4e, 0x47]);
    });
});

test("draw reports a command that paints outside the raster", () => {
    withTempDir((dir) => {
        const file = join(dir, "bad.txt");
        writeFileSync(file, "2\n2\n0\nright 5 1\n");
        const io = capture();
        assert.equal(main(["draw", file], io), 1);
        assert.equal(io.err, "Command 1 paints outside the raster at (0, 2)\n");
    });
});

test("compress --verify prints the drawing, its size and the check", () => {
    withTempDir((dir) => {
        const file = join(dir, "raster.txt");
        writeFileSync(file, "04\n10\n12\n00\n");
        const io = capture();
        assert.equal(main(["compress", file, "--verify"], io), 0);
        assert.equal(
            io.out,
            "4\n2\n0\ndown 2 1\ndown 1 0\nright 1 0\nup 1 2\nup 1 0\nup 1 4\n" +
                "6 commands (column-serpentine)\n" +
                "round trip ok\n"
        );
    });
});

test("compress --strategy forces one strategy", () => {
    withTempDir((dir) => {
        const file = join(dir, "raster.txt");
        writeFileSync(file, "5000\n0000\n");
        const io = capture();
        assert.equal(main(["compress", file, "--strategy", "row-sparse"], io), 0);
        assert.equal(io.out, "2\n4\n0\nleft 1\nright 1 5\n2 commands (row-sparse)\n");
    });
});

test("compress rejects an unknown strategy", () => {
    const io = capture();
    assert.equal(main(["compress", "raster.txt", "--strategy", "zigzag"], io), 2);
    assert.ok(io.err.startsWith('Unknown strategy: "zigzag"'));
});

test("a missing file is reported", () => {
    withTempDir((dir) => {
        const file = join(dir, "missing.txt");
        const io = capture();
        assert.equal(main(["compress", file], io), 1);
        assert.equal(io.err, `File not found: ${file}\n`);
    });
});

test("bad usage prints the usage text", () => {
    const io = capture();
    assert.equal(main([], io), 2);
    assert.ok(io.err.startsWith("Usage:"));

    const unknown = capture();
    assert.equal(main(["draw", "x.txt", "--nope"], unknown), 2);
});

test("draw --png refuses an image beyond the pixel limit", () => {
    withTempDir((dir) => {
        const file = join(dir, "large.txt");
        const png = join(dir, "large.png");
        writeFileSync(file, "1000\n1000\n0\nright 5 3\n");
        const io = capture();
        assert.equal(main(["draw", file, "--png", png], io), 1);
        assert.equal(io.err, "Image of 10000x10000 pixels exceeds the 16777216 pixel limit. Use a smaller scale.\n");
        assert.equal(io.out, "");
        assert.equal(existsSync(png), false);
    });
});
