// Command output is compared as plain text
process.env.NO_COLOR = '1';
