export const minimalConfigTemplate = `scale_factor: 0.01
room_type_labels: [living_room, kitchen, bedroom, bathroom, outside]
`;
