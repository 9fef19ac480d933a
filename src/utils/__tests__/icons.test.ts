import { getIcon, renderIcon } from "../icons";
import { FrameBuffer } from "@services/matrix/FrameBuffer";
import { Colors } from "@core/types";

describe("icons", () => {
  it("should load the weather icons as 8x8", () => {
    for (const name of ["sunny", "cloudy", "rainy", "night"] as const) {
      const rows = getIcon(name);
      expect(rows).toHaveLength(8);
      rows.forEach((row) => expect(row).toHaveLength(8));
    }
  });

  it("should load the bikeshare icons as 9x9", () => {
    for (const name of ["wheel", "bolt", "boltPlus", "dock"] as const) {
      const rows = getIcon(name);
      expect(rows).toHaveLength(9);
      rows.forEach((row) => expect(row).toHaveLength(9));
    }
  });

  it("should draw the lit pixels at an offset", () => {
    const frame = new FrameBuffer(16, 16);

    renderIcon(frame, "sunny", 4, 2, Colors.YELLOW);

    // first row of the sun is 00011000
    expect(frame.getPixel(7, 2)).toEqual(Colors.YELLOW);
    expect(frame.getPixel(8, 2)).toEqual(Colors.YELLOW);
    expect(frame.getPixel(6, 2)).toEqual(Colors.BLACK);
  });

  it("should clip at the frame edge", () => {
    const frame = new FrameBuffer(4, 4);
    expect(() => renderIcon(frame, "cloudy", 0, 0, Colors.WHITE)).not.toThrow();
  });
});
