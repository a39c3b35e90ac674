import { describe, expect, it } from "vitest";
import { fitChamber } from "../src/game/chambers";
import {
  PORTAL_COOLDOWN,
  createTeleporter,
  initTeleporter,
  loadTeleporter,
  updateTeleporter,
} from "../src/game/chambers/teleporter";
import { makeRng } from "../src/game/random";
import type { TeleporterChamber } from "../src/game/types";
import { localBall, viewport } from "./helpers";

function linkedPair(): TeleporterChamber {
  const chamber = createTeleporter();
  fitChamber(chamber, viewport(480, 270));
  chamber.portals = [
    { x: 100, y: 100, radius: 22, color: [50, 150, 255], target: 1 },
    { x: 300, y: 150, radius: 22, color: [50, 255, 200], target: 0 },
  ];
  return chamber;
}

describe("teleporter", () => {
  it("places two or three linked pairs", () => {
    const chamber = createTeleporter();
    initTeleporter(chamber, 480, 270, makeRng(17));
    const count = chamber.portals.length;
    expect(count % 2).toBe(0);
    expect(count).toBeLessThanOrEqual(6);
    chamber.portals.forEach((portal, i) => {
      expect(chamber.portals[portal.target].target).toBe(i);
    });
  });

  it("sends a ball out of the partner along its direction of travel", () => {
    const chamber = linkedPair();
    const ball = localBall({ id: 7, x: 105, y: 100, vx: 100 });
    updateTeleporter(chamber, 1 / 60, [ball]);
    expect(ball.x).toBe(334);
    expect(ball.y).toBe(150);
    expect(ball.vx).toBe(100);
    expect(chamber.cooldowns.get(7)).toBe(PORTAL_COOLDOWN);
  });

  it("drops a resting ball straight below the partner", () => {
    const chamber = linkedPair();
    const ball = localBall({ x: 300, y: 150 });
    updateTeleporter(chamber, 1 / 60, [ball]);
    expect(ball.x).toBe(100);
    expect(ball.y).toBe(134);
  });

  it("does not teleport a ball again while it cools down", () => {
    const chamber = linkedPair();
    const ball = localBall({ id: 7, x: 105, y: 100, vx: 100 });
    updateTeleporter(chamber, 1 / 60, [ball]);

    ball.x = 300;
    ball.y = 150;
    updateTeleporter(chamber, 1 / 60, [ball]);
    expect(ball.x).toBe(300);
    expect(chamber.cooldowns.has(7)).toBe(true);

    for (let i = 0; i < 13; i++) updateTeleporter(chamber, 1 / 60, []);
    expect(chamber.cooldowns.has(7)).toBe(false);
  });

  it("rejects saved portals whose link points outside the list", () => {
    const chamber = linkedPair();
    loadTeleporter(chamber, {
      portals: [{ x: 1, y: 1, radius: 5, color: [0, 0, 0], target: 3 }],
      cooldowns: [
        [4, 0.1],
        [5, -1],
      ],
      t: 2,
    });
    expect(chamber.portals).toHaveLength(2);
    expect([...chamber.cooldowns]).toEqual([[4, 0.1]]);
    expect(chamber.t).toBe(2);
  });
});
