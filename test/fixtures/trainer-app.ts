import { defineApp, Flow, Work } from "../../src/api.js";

class Trainer extends Work<[{ batch: number }], { loss: number }> {
  run({ batch }: { batch: number }): { loss: number } {
    this.setState("progress", batch);
    return { loss: 0.42 };
  }
}

export const trainer = new Trainer({ initialState: { progress: 0 } });
export const results: Array<{ loss: number }> = [];

export default defineApp({
  root: new Flow().add("trainer", trainer),
  async main() {
    results.push(await trainer.call({ batch: 5 }));
  },
});
