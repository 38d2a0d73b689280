export default ['packages/core', 'packages/cli'];
