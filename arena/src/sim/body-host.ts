import type { GuidanceHost } from "../../../packages/intercept-core/src/index.ts";
import type { ArenaWorld } from "./arena-world.ts";

/** Binds one world body to the guidance host contract. */
export function createBodyHost(world: ArenaWorld, bodyId: number): GuidanceHost {
  const body = world.body(bodyId);
  if (!body) {
    throw new Error(`body not found: ${bodyId}`);
  }
  return {
    sense: () => world.scan(bodyId),
    selfKinematics: () => ({
      position: body.position,
      velocity: body.velocity,
      heading: body.heading,
      angularVelocity: body.angularVelocity,
    }),
    setSensorAim: (aim) => world.setSensorAim(bodyId, aim),
    actuateLinear: (accel) => {
      world.command(bodyId).linear = accel;
    },
    actuateTorque: (angularAccel) => {
      world.command(bodyId).torque = angularAccel;
    },
    actuateTurnRate: (angularVelocity) => {
      world.command(bodyId).turnRate = angularVelocity;
    },
    triggerWeapon: (index) => {
      world.command(bodyId).weapons.add(index);
    },
    triggerSelfDestruct: () => {
      world.command(bodyId).selfDestruct = true;
    },
  };
}
