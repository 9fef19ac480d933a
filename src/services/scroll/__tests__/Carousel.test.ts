import { Carousel } from "../Carousel";

describe("Carousel", () => {
  it("should have no current item when empty", () => {
    const carousel = new Carousel<string>(3);
    expect(carousel.current()).toBeNull();
    expect(carousel.size).toBe(0);
    expect(carousel.next()).toBeNull();
    expect(carousel.advance(10)).toBe(false);
  });

  it("should cycle through the items on the dwell timer", () => {
    const carousel = new Carousel<string>(3);
    carousel.setItems(["a", "b", "c"]);

    expect(carousel.current()).toBe("a");
    expect(carousel.advance(2)).toBe(false);
    expect(carousel.advance(1)).toBe(true);
    expect(carousel.current()).toBe("b");
    carousel.advance(3);
    carousel.advance(3);
    expect(carousel.current()).toBe("a");
  });

  it("should move on the 90th tick of a 3 s dwell at 30 Hz", () => {
    const carousel = new Carousel<string>(3);
    carousel.setItems(["a", "b"]);

    const moved: number[] = [];
    for (let i = 1; i <= 90; i++) {
      if (carousel.advance(1 / 30)) {
        moved.push(i);
      }
    }

    expect(moved).toEqual([90]);
    expect(carousel.current()).toBe("b");
    expect(carousel.elapsed).toBe(0);
  });

  it("should carry leftover dwell time", () => {
    const carousel = new Carousel<string>(3);
    carousel.setItems(["a", "b", "c"]);
    carousel.advance(7);
    expect(carousel.index).toBe(2);
    expect(carousel.elapsed).toBe(1);
  });

  it("should only move on next() when the timer is disabled", () => {
    const carousel = new Carousel<string>(0);
    carousel.setItems(["a", "b"]);
    expect(carousel.advance(100)).toBe(false);
    expect(carousel.next()).toBe("b");
    expect(carousel.next()).toBe("a");
  });

  it("should keep the current item when it survives setItems", () => {
    const carousel = new Carousel<{ id: string }>(5, (item) => item.id);
    carousel.setItems([{ id: "x" }, { id: "y" }, { id: "z" }]);
    carousel.next();

    carousel.setItems([{ id: "w" }, { id: "y" }]);

    expect(carousel.current()).toEqual({ id: "y" });
    expect(carousel.index).toBe(1);
  });

  it("should restart at the first item when the current item is gone", () => {
    const carousel = new Carousel<string>(5);
    carousel.setItems(["a", "b"]);
    carousel.next();

    carousel.setItems(["c", "d"]);

    expect(carousel.current()).toBe("c");
    expect(carousel.elapsed).toBe(0);
  });

  it("should reset to the first item", () => {
    const carousel = new Carousel<string>(5);
    carousel.setItems(["a", "b"]);
    carousel.advance(6);
    carousel.reset();
    expect(carousel.index).toBe(0);
    expect(carousel.elapsed).toBe(0);
  });
});
