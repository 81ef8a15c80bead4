export const defaultConfigTemplate = `# r2vscene converter configuration
# Distances are in metres unless noted.

# Metres per detector pixel
scale_factor: 0.01

# Room types, in the order the detector numbers them
room_type_labels:
  - living_room
  - kitchen
  - bedroom
  - bathroom
  - restroom
  - balcony
  - closet
  - corridor
  - washing_room
  - storage
  - outside

unknown_room_label: unknown
excluded_room_labels: [outside]

default_wall_thickness: 0.1
opening_match_tolerance: 0.1
corner_snap_tolerance: 0.05

axis:
  flip_y: true
  origin: [0, 0]     # pixels

label_assignment: auto        # auto | wall-sides | centroid
host_tie_break: shortest      # shortest | longest
room_sort_axis: x             # x | y
max_trace_steps: 500

split_walls:
  enabled: true
  max_iter: 100
straighten_walls:
  enabled: false
  cutoff_gradient: 0.05
  max_iter: 100

# Raster-to-vector output marks every opening "door": decide doors and
# windows from interior walls and entrance markers instead.
opening_classification: entrance   # detector | entrance
entrance_classes: [entrance]
interior_openings_as_doors: false
ignored_icon_classes: []

arch_defaults:
  wall_height: 2.75
  door_max_y: 2.1
  window_min_y: 0.9
  window_max_y: 2.1
`;
