class Holder { item: Missing; }
