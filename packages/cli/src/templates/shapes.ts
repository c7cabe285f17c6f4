export const shapesTemplate = `# Drawing script: one of each shape
version: "0.1"
canvas:
  width: 300
  height: 120

commands:
  - op: clear
    color: "#ffffff"
    region: { x: 0, y: 0, width: 300, height: 120 }

  - op: stroke
    shape: { type: line, from: [10, 10], to: [50, 50] }
    color: "#000000"
    width: 2

  - op: fill
    shape: { type: ellipse, center: [90, 30], radii: [25, 15], rotation: 30 }
    color: "#29adff"

  - op: stroke
    shape: { type: arc, center: [150, 30], radii: [20, 20], start: 0, sweep: 270 }
    color: "#ff004d"
    width: 3
    cap: round

  - op: fill-even-odd
    shape:
      type: path
      elements:
        - { op: move, to: [190, 10] }
        - { op: quad, ctrl: [230, -10], to: [250, 30] }
        - { op: cubic, ctrl1: [240, 60], ctrl2: [200, 60], to: [190, 10] }
        - { op: close }
    color: "#00e436"

  - op: save
  - op: transform
    translate: [60, 90]
    rotate: 45
  - op: fill
    shape: { type: rect, x: -10, y: -10, width: 20, height: 20 }
    color: "#83769c"
  - op: restore

  - op: stroke
    shape: { type: rect, x: 100, y: 70, width: 80, height: 40 }
    color: "#000000"
    width: 1
    dash: [4, 2]
`;
