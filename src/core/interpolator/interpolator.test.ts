import { describe, expect, it } from "vitest";
import { clamp01, lerp, lerpAngle, normalizeAngle } from "../lerp/lerp";
import { Interpolator, REPLICATION_INTERVAL_MS, REPLICATION_RATE } from "./interpolator";

describe("lerp helpers", () => {
	it("should interpolate and extrapolate linearly", () => {
		expect(lerp(0, 100, 0.75)).toBe(75);
		expect(lerp(0, 100, 1.5)).toBe(150);
	});

	it("should clamp to [0, 1]", () => {
		expect(clamp01(-0.5)).toBe(0);
		expect(clamp01(0.3)).toBe(0.3);
		expect(clamp01(2)).toBe(1);
	});

	it("should normalize angles into [0, 360)", () => {
		expect(normalizeAngle(360)).toBe(0);
		expect(normalizeAngle(-90)).toBe(270);
		expect(normalizeAngle(725)).toBe(5);
	});

	it("should take the shortest arc between angles", () => {
		expect(lerpAngle(350, 10, 0.5)).toBe(0);
		expect(lerpAngle(350, 10, 0.25)).toBe(355);
		expect(lerpAngle(10, 350, 0.5)).toBe(0);
		expect(lerpAngle(0, 90, 0.5)).toBe(45);
	});
});

describe("Interpolator", () => {
	it("should use a 16 Hz replication interval", () => {
		expect(REPLICATION_RATE).toBe(16);
		expect(REPLICATION_INTERVAL_MS).toBe(62.5);
		expect(new Interpolator().interval).toBe(62.5);
	});

	it("should seed both ends with the first sample", () => {
		const x = new Interpolator();
		x.set(4, 1000);

		expect(x.previous).toBe(4);
		expect(x.target).toBe(4);
		expect(x.get(1000)).toBe(4);
	});

	it("should return the previous value at the set time and the new one an interval later", () => {
		const x = new Interpolator();
		x.set(0, 1000);
		x.set(10, 1000);

		expect(x.get(1000)).toBe(0);
		expect(x.get(1000 + 31.25)).toBe(5);
		expect(x.get(1000 + REPLICATION_INTERVAL_MS)).toBe(10);
		expect(x.get(5000)).toBe(10);
		expect(x.lastSetAt).toBe(1000);
	});

	it("should blend from the old target when a new sample arrives", () => {
		const x = new Interpolator(100);
		x.set(0, 0);
		x.set(10, 0);
		x.set(30, 200);

		expect(x.previous).toBe(10);
		expect(x.target).toBe(30);
		expect(x.get(250)).toBe(20);
	});

	it("should interpolate angles through 360/0", () => {
		const yaw = new Interpolator();
		yaw.set(350, 0);
		yaw.set(10, 0);

		expect(yaw.getAngle(REPLICATION_INTERVAL_MS / 4)).toBe(355);
		expect(yaw.getAngle(REPLICATION_INTERVAL_MS / 2)).toBe(0);
		expect(yaw.getAngle(REPLICATION_INTERVAL_MS)).toBe(10);
	});

	it("should jump straight to a snapped value", () => {
		const x = new Interpolator();
		x.set(0, 0);
		x.set(10, 0);
		x.snap(50, 10);

		expect(x.get(10)).toBe(50);
		expect(x.previous).toBe(50);
	});

	it("should return the target right away with a zero interval", () => {
		const x = new Interpolator(0);
		x.set(1, 0);
		x.set(2, 0);

		expect(x.get(0)).toBe(2);
	});
});
