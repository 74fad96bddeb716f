import assert from "node:assert/strict";
import test from "node:test";
import { formatCommand, move, paint, parseCommand, transposeCommand } from "../lib/command.js";
import { FormatError } from "../lib/errors.js";

test("parseCommand reads a painting command", () => {
    assert.deepEqual(parseCommand("left 10 3"), { direction: "left", distance: 10, paint: true, colour: 3 });
    assert.deepEqual(parseCommand("up 2 c"), { direction: "up", distance: 2, paint: true, colour: 12 });
});

test("parseCommand reads a move without a colour", () => {
    assert.deepEqual(parseCommand("up 1"), { direction: "up", distance: 1, paint: false });
});

test("parseCommand accepts signed distances and extra whitespace", () => {
    assert.deepEqual(parseCommand("down -3 c"), { direction: "down", distance: -3, paint: true, colour: 12 });
    assert.deepEqual(parseCommand("  right\t+2  "), { direction: "right", distance: 2, paint: false });
});

test("parseCommand normalises a negative zero distance", () => {
    const command = parseCommand("down -0 1");
    assert.ok(Object.is(command.distance, 0));
});

test("parseCommand rejects the wrong number of tokens", () => {
    assert.throws(() => parseCommand("up"), {
        name: "FormatError",
        message: 'Bad command (should have 2 or 3 parts): "up"',
    });
    assert.throws(() => parseCommand("up 1 2 3"), FormatError);
    assert.throws(() => parseCommand(""), FormatError);
});

test("parseCommand rejects bad directions, distances and colours", () => {
    assert.throws(() => parseCommand("sideways 1", 4), {
        message: 'Bad direction (should be up, down, left, or right): "sideways" (line 4)',
    });
    assert.throws(() => parseCommand("up x"), { message: 'Bad distance (should be a number): "x"' });
    assert.throws(() => parseCommand("up 1.5"), FormatError);
    assert.throws(() => parseCommand("up 99999999999999999999"), FormatError);
    assert.throws(() => parseCommand("up 1 g"), FormatError);
    assert.throws(() => parseCommand("Up 1"), FormatError);
});

test("formatCommand writes the text grammar", () => {
    assert.equal(formatCommand(paint("right", 3, 15)), "right 3 f");
    assert.equal(formatCommand(move("up", -2)), "up -2");
    assert.equal(formatCommand(parseCommand("down 0 4")), "down 0 4");
});

test("transposeCommand swaps the row and column axes", () => {
    assert.deepEqual(transposeCommand(paint("up", 2, 1)), paint("left", 2, 1));
    assert.deepEqual(transposeCommand(move("right", 5)), move("down", 5));
});

test("parseCommand bounds distances to 32-bit integers", () => {
    assert.equal(parseCommand("right 2147483647").distance, 2147483647);
    assert.equal(parseCommand("left -2147483648").distance, -2147483648);
    assert.throws(() => parseCommand("right 2147483648", 4), {
        name: "FormatError",
        message: 'Bad distance (should be between -2147483648 and 2147483647): "2147483648" (line 4)',
    });
    assert.throws(() => parseCommand("right 9007199254740991"), FormatError);
});
