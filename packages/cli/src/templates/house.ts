export const houseTemplate = `# Drawing script: a house at dusk
version: "0.1"
canvas:
  width: 240
  height: 200
  background: "#1d2b53"

commands:
  # Sky glow behind the roof
  - op: blurred-rect
    rect: { x: 40, y: 40, width: 160, height: 60 }
    radius: 12
    color: "#ffa30080"

  # Walls
  - op: fill
    shape: { type: rect, x: 60, y: 100, width: 120, height: 80 }
    color: "#c2c3c7"

  # Roof
  - op: fill
    shape:
      type: path
      elements:
        - { op: move, to: [50, 100] }
        - { op: line, to: [120, 50] }
        - { op: line, to: [190, 100] }
        - { op: close }
    color: "#7e2553"

  # Door, clipped to the wall
  - op: save
  - op: clip
    shape: { type: rect, x: 60, y: 100, width: 120, height: 80 }
  - op: fill
    shape: { type: rounded-rect, x: 105, y: 135, width: 30, height: 50, radius: 6 }
    color: "#ab5236"
  - op: restore

  # Window
  - op: fill
    shape: { type: circle, center: [150, 125], radius: 10 }
    color: "#ffec27"
  - op: stroke
    shape: { type: circle, center: [150, 125], radius: 10 }
    color: "#5f574f"
    width: 2

  # Caption, in the last fill color
  - op: text
    text: "Home"
    at: [104, 196]
`;
